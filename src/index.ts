// Main entry point for the etcd-bootstrapper library

// Membership model
export * from './membership/types';
export * from './membership/Roster';

// Member-management API
export * from './admin/types';
export * from './admin/EtcdAdminClient';

// Reconciliation
export * from './reconciliation/MembershipReconciler';

// Inventory and identity
export * from './inventory/types';
export * from './inventory/YamlInventorySource';
export * from './inventory/IdentitySources';

// Directive emission
export * from './bootstrap/DropInWriter';
export * from './bootstrap/Bootstrapper';

// Configuration
export * from './config/BootstrapperConfiguration';

// Common
export * from './common/errors';
export * from './common/logger';
