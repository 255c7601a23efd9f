import { ConsoleLogger, LogLevel } from '@nestjs/common';

// Nest console logger that keeps stdout for command output.
export class CliLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
    _writeStreamType?: 'stdout' | 'stderr',
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
