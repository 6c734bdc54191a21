import { ContainerRuntime, ContainerStats, ContainerSummary, LogOptions } from '../src/core/ContainerGateway';
import { AuditEvent, AuditSink } from '../src/storage/AuditLog';
import { ExecResult } from '../src/types';

export class MemoryAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  async record(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }

  decisions(): string[] {
    return this.events.map((event) => `${event.operation}:${event.decision}`);
  }
}

export function summary(name: string): ContainerSummary {
  return {
    id: `${name}-id`,
    name,
    image: `${name}:latest`,
    state: 'running',
    status: 'Up 1 minute',
    created: 1700000000,
    labels: {},
    ports: [],
  };
}

/** In-memory container engine; exec answers come from `execResults` keyed by joined argv. */
export class FakeRuntime implements ContainerRuntime {
  readonly calls: string[] = [];
  readonly execCalls: Array<{ name: string; argv: string[]; timeoutMs: number }> = [];
  execResults = new Map<string, ExecResult>();
  execError?: Error;
  logText = '';
  inspectData: unknown = {};

  constructor(readonly containers: ContainerSummary[] = []) {}

  async listContainers(): Promise<ContainerSummary[]> {
    this.calls.push('list');
    return this.containers;
  }

  async logs(name: string, options: LogOptions): Promise<string> {
    this.calls.push(`logs ${name} tail=${options.tail} since=${options.since ?? ''}`);
    return this.logText;
  }

  async stats(name: string): Promise<ContainerStats> {
    this.calls.push(`stats ${name}`);
    return {
      name,
      cpuPercent: 1.5,
      memoryUsageBytes: 1024,
      memoryLimitBytes: 4096,
      memoryPercent: 25,
      networkRxBytes: 10,
      networkTxBytes: 20,
      pids: 3,
    };
  }

  async inspect(name: string): Promise<unknown> {
    this.calls.push(`inspect ${name}`);
    return this.inspectData;
  }

  async exec(name: string, argv: string[], options: { timeoutMs: number }): Promise<ExecResult> {
    this.execCalls.push({ name, argv, timeoutMs: options.timeoutMs });
    if (this.execError) {
      throw this.execError;
    }
    return this.execResults.get(argv.join(' ')) ?? { exitCode: 0, output: '' };
  }

  async start(name: string): Promise<void> {
    this.calls.push(`start ${name}`);
  }

  async stop(name: string): Promise<void> {
    this.calls.push(`stop ${name}`);
  }

  async restart(name: string): Promise<void> {
    this.calls.push(`restart ${name}`);
  }
}
