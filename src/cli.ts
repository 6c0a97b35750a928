#!/usr/bin/env node
import { createBootstrapper } from './bootstrap/Bootstrapper';
import { loadConfiguration } from './config/BootstrapperConfiguration';
import { describeCause } from './common/errors';
import { BootstrapLogger, createLogger } from './common/logger';

export { VERSION } from './config/BootstrapperConfiguration';

export interface CliIO {
  stdout: (line: string) => void;
  logger?: BootstrapLogger;
}

/**
 * Run the tool and resolve with the process exit code.
 * A `new` outcome is a successful run; fatal errors exit 1 without a drop-in.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv, io: CliIO = { stdout: console.log }): Promise<number> {
  let logger = io.logger ?? createLogger({ enableTestMode: false });

  try {
    const command = await loadConfiguration(argv, env);
    if (command.kind === 'exit') {
      io.stdout(command.output);
      return 0;
    }
    const { config } = command;
    if (config.verbose && !io.logger) {
      logger = createLogger({ enableTestMode: false, enableDebugLogs: true });
    }

    logger.bootstrap(`Drop-in file: ${config.dropInFile}`);
    logger.bootstrap(`Timeout: ${config.timeoutMs}ms`);
    logger.bootstrap(`Client schema: ${config.urls.clientSchema}`);
    logger.bootstrap(`Client port: ${config.urls.clientPort}`);
    logger.bootstrap(`Peer schema: ${config.urls.peerSchema}`);
    logger.bootstrap(`Peer port: ${config.urls.peerPort}`);

    const bootstrapper = await createBootstrapper(config, logger);
    const result = await bootstrapper.run();
    logger.info(`Initial cluster state: ${result.directive.mode}`);
    return 0;
  } catch (error) {
    logger.error(describeCause(error));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2), process.env).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`[ERROR] ${describeCause(error)}`);
      process.exitCode = 1;
    }
  );
}
