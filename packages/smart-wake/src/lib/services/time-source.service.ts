import { BehaviorSubject } from 'rxjs';

export class TimeSourceService {
  private readonly offsetSubject = new BehaviorSubject(0);

  readonly offset$ = this.offsetSubject.asObservable();

  now(): number {
    return Date.now() + this.offsetSubject.getValue();
  }

  offset(): number {
    return this.offsetSubject.getValue();
  }

  setOffset(ms: number): void {
    this.offsetSubject.next(ms);
  }

  resetOffset(): void {
    this.offsetSubject.next(0);
  }
}
