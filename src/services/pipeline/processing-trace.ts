import type { Logger } from '../../utils/logger';

type TraceLevel = 'info' | 'warn' | 'error';

/** Ordered, human-readable audit trail of one run, mirrored to the structured log. */
export class ProcessingTrace {
  private readonly lines: string[] = [];

  constructor(private readonly log: Logger) {}

  add(stage: string, message: string, level: TraceLevel = 'info'): void {
    this.lines.push(`[${stage}] ${message}`);
    this.log[level]({ stage }, message);
  }

  entries(): string[] {
    return [...this.lines];
  }
}
