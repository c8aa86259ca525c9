import type { LiveHost, ResultSink } from './types';

/** Writes each validated host on its own line as soon as it is accepted. */
export class StreamSink implements ResultSink {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  accept(result: LiveHost): void {
    this.out.write(`${result.host}\n`);
  }
}

/** Keeps every accepted host for the end-of-run report. */
export class ReportCollector implements ResultSink {
  private readonly hosts: LiveHost[] = [];

  accept(result: LiveHost): void {
    this.hosts.push(result);
  }

  get results(): readonly LiveHost[] {
    return this.hosts;
  }
}

export function fanOut(...sinks: ResultSink[]): ResultSink {
  return {
    accept(result: LiveHost): void {
      for (const sink of sinks) sink.accept(result);
    },
  };
}
