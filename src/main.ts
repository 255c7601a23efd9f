#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliService } from './cli/cli.service';
import { describeError, isWalletError } from './common/errors/wallet.errors';
import { CliLogger } from './common/logging/cli-logger';
import { AppConfig, loadAppConfig } from './config/app.config';

async function bootstrap(argv: string[]): Promise<number> {
  let config: AppConfig;
  try {
    config = loadAppConfig();
  } catch (error) {
    if (isWalletError(error)) {
      process.stderr.write(`${error.kind}: ${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const app = await NestFactory.createApplicationContext(AppModule.forRoot(config), {
    logger: new CliLogger('wallet', { logLevels: config.logLevels }),
  });
  try {
    return await app.get(CliService).run(argv);
  } finally {
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`UnexpectedError: ${describeError(error)}\n`);
    process.exitCode = 1;
  },
);
