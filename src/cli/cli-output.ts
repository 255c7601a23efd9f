import { Injectable } from '@nestjs/common';

// Where command output goes. Results on stdout, errors and notices on stderr.
@Injectable()
export class CliOutput {
  out(line = ''): void {
    process.stdout.write(line + '\n');
  }

  err(line: string): void {
    process.stderr.write(line + '\n');
  }
}
