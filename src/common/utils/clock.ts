import { Injectable } from '@nestjs/common';

// Wall clock behind DI so staleness checks can be pinned in tests.
@Injectable()
export class Clock {
  now(): Date {
    return new Date();
  }
}
