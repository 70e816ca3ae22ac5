import { IClock } from '../../domain/common/IClock';

export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }
}
