/**
 * HarborGate DockerRuntime
 * dockerode-backed ContainerRuntime
 */

import Dockerode from 'dockerode';
import { existsSync } from 'fs';
import os from 'os';
import path from 'path';
import { PassThrough } from 'stream';
import { z } from 'zod';
import { DockerConfig, ExecResult } from '../types';
import { ContainerRuntime, ContainerStats, ContainerSummary, LogOptions } from '../core/ContainerGateway';
import { ExecutionFailureError, HarborGateError, NotFoundError, TimeoutError, errorMessage } from '../core/errors';
import { logger } from '../core/Logger';

const DOCKER_SOCKET_CANDIDATES = [
  '/var/run/docker.sock',
  path.join(os.homedir(), '.docker/run/docker.sock'),
  path.join(os.homedir(), 'Library/Containers/com.docker.docker/Data/docker.raw.sock'),
];

export function createDockerClient(config: Pick<DockerConfig, 'socketPath' | 'apiVersion'> = {}): Dockerode {
  const options: Dockerode.DockerOptions = {};

  const version = normalizeApiVersion(config.apiVersion ?? process.env.DOCKER_API_VERSION);
  if (version) {
    options.version = version;
  }

  const socketPath = config.socketPath ?? resolveSocketPath();
  if (socketPath) {
    options.socketPath = socketPath;
  }

  return new Dockerode(options);
}

function resolveSocketPath(): string | undefined {
  if (process.env.DOCKER_HOST) {
    return undefined;
  }
  return DOCKER_SOCKET_CANDIDATES.find((candidate) => existsSync(candidate));
}

function normalizeApiVersion(version?: string): string | undefined {
  if (!version) {
    return undefined;
  }
  return version.startsWith('v') ? version : `v${version}`;
}

// ---------------------------------------------------------------------------
// Log decoding
// ---------------------------------------------------------------------------

/**
 * Decode a multiplexed log buffer (8-byte frame headers) into text.
 * Buffers from TTY containers carry no headers and are returned as-is.
 */
export function decodeLogBuffer(buffer: Buffer): string {
  const framed = buffer.length >= 8 && buffer[0] <= 2 && buffer[1] === 0 && buffer[2] === 0 && buffer[3] === 0;
  if (!framed) {
    return buffer.toString('utf8');
  }

  const chunks: Buffer[] = [];
  let offset = 0;
  while (offset + 8 <= buffer.length) {
    const size = buffer.readUInt32BE(offset + 4);
    chunks.push(buffer.subarray(offset + 8, offset + 8 + size));
    offset += 8 + size;
  }
  return Buffer.concat(chunks).toString('utf8');
}

const RELATIVE_SINCE = /^(\d+)([smhd])$/;
const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/**
 * `since` as Unix seconds. Accepts Unix seconds, an ISO timestamp, or a
 * relative duration such as `10m`.
 */
export function parseSince(since: string, now: number = Date.now()): number {
  if (/^\d+$/.test(since)) {
    return Number(since);
  }
  const relative = RELATIVE_SINCE.exec(since);
  if (relative) {
    return Math.floor(now / 1000) - Number(relative[1]) * UNIT_SECONDS[relative[2]];
  }
  const parsed = Date.parse(since);
  if (Number.isNaN(parsed)) {
    throw new ExecutionFailureError(`invalid since value: ${since}`);
  }
  return Math.floor(parsed / 1000);
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

const cpuSchema = z.object({
  cpu_usage: z.object({
    total_usage: z.number().default(0),
    percpu_usage: z.array(z.number()).optional(),
  }),
  system_cpu_usage: z.number().default(0),
  online_cpus: z.number().optional(),
});

const rawStatsSchema = z.object({
  cpu_stats: cpuSchema,
  precpu_stats: cpuSchema,
  memory_stats: z
    .object({
      usage: z.number().default(0),
      limit: z.number().default(0),
      stats: z.object({ cache: z.number().optional() }).passthrough().optional(),
    })
    .default({}),
  networks: z.record(z.object({ rx_bytes: z.number(), tx_bytes: z.number() }).passthrough()).optional(),
  pids_stats: z.object({ current: z.number().optional() }).optional(),
});

export function summarizeStats(name: string, raw: unknown): ContainerStats {
  const stats = rawStatsSchema.parse(raw);

  const cpuDelta = stats.cpu_stats.cpu_usage.total_usage - stats.precpu_stats.cpu_usage.total_usage;
  const systemDelta = stats.cpu_stats.system_cpu_usage - stats.precpu_stats.system_cpu_usage;
  const cpus = stats.cpu_stats.online_cpus ?? stats.cpu_stats.cpu_usage.percpu_usage?.length ?? 1;
  const cpuPercent = systemDelta > 0 && cpuDelta > 0 ? (cpuDelta / systemDelta) * cpus * 100 : 0;

  const memoryUsage = stats.memory_stats.usage - (stats.memory_stats.stats?.cache ?? 0);
  const memoryLimit = stats.memory_stats.limit;

  let rx = 0;
  let tx = 0;
  for (const network of Object.values(stats.networks ?? {})) {
    rx += network.rx_bytes;
    tx += network.tx_bytes;
  }

  return {
    name,
    cpuPercent: Math.round(cpuPercent * 100) / 100,
    memoryUsageBytes: memoryUsage,
    memoryLimitBytes: memoryLimit,
    memoryPercent: memoryLimit > 0 ? Math.round((memoryUsage / memoryLimit) * 10000) / 100 : 0,
    networkRxBytes: rx,
    networkTxBytes: tx,
    pids: stats.pids_stats?.current ?? 0,
  };
}

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export class DockerRuntime implements ContainerRuntime {
  constructor(private readonly docker: Dockerode = createDockerClient()) {}

  async listContainers(): Promise<ContainerSummary[]> {
    const containers = await this.wrap('*', () => this.docker.listContainers({ all: true }));
    return containers.map((info) => ({
      id: info.Id.slice(0, 12),
      name: (info.Names[0] ?? '').replace(/^\//, ''),
      image: info.Image,
      state: info.State,
      status: info.Status,
      created: info.Created,
      labels: info.Labels ?? {},
      ports: info.Ports.map((port) =>
        port.PublicPort
          ? `${port.IP ?? ''}:${port.PublicPort}->${port.PrivatePort}/${port.Type}`
          : `${port.PrivatePort}/${port.Type}`
      ),
    }));
  }

  async logs(name: string, options: LogOptions): Promise<string> {
    const since = options.since ? parseSince(options.since) : undefined;
    const buffer = await this.wrap(name, () =>
      this.docker.getContainer(name).logs({
        stdout: true,
        stderr: true,
        follow: false,
        tail: options.tail,
        since,
      })
    );
    return decodeLogBuffer(buffer);
  }

  async stats(name: string): Promise<ContainerStats> {
    const raw: unknown = await this.wrap(name, () => this.docker.getContainer(name).stats({ stream: false }));
    return summarizeStats(name, raw);
  }

  async inspect(name: string): Promise<unknown> {
    return this.wrap(name, () => this.docker.getContainer(name).inspect());
  }

  /**
   * Exec with stdout and stderr demultiplexed into one combined output.
   * The stream is destroyed if the deadline passes.
   */
  async exec(name: string, argv: string[], options: { timeoutMs: number }): Promise<ExecResult> {
    const container = this.docker.getContainer(name);
    const exec = await this.wrap(name, () =>
      container.exec({ Cmd: argv, AttachStdout: true, AttachStderr: true, AttachStdin: false })
    );
    const stream = await this.wrap(name, () => exec.start({ hijack: true, stdin: false }));

    let output = '';
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    stdout.on('data', (chunk: Buffer) => {
      output += chunk.toString();
    });
    stderr.on('data', (chunk: Buffer) => {
      output += chunk.toString();
    });
    this.docker.modem.demuxStream(stream, stdout, stderr);

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      stream.destroy();
    }, options.timeoutMs);

    try {
      await new Promise<void>((resolve, reject) => {
        stream.on('end', resolve);
        stream.on('close', resolve);
        stream.on('error', (error: Error) => (timedOut ? resolve() : reject(error)));
      });
    } catch (error) {
      throw new ExecutionFailureError(`exec stream failed in ${name}: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    if (timedOut) {
      logger.warn('Container exec timed out', { container: name, timeoutMs: options.timeoutMs });
      throw new TimeoutError(`exec in ${name} timed out after ${options.timeoutMs}ms`, options.timeoutMs);
    }

    const info = await this.wrap(name, () => exec.inspect());
    return { exitCode: info.ExitCode ?? 0, output };
  }

  async start(name: string): Promise<void> {
    await this.wrap(name, () => this.docker.getContainer(name).start());
  }

  async stop(name: string): Promise<void> {
    await this.wrap(name, () => this.docker.getContainer(name).stop());
  }

  async restart(name: string): Promise<void> {
    await this.wrap(name, () => this.docker.getContainer(name).restart());
  }

  private async wrap<T>(name: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof HarborGateError) {
        throw error;
      }
      if (statusCodeOf(error) === 404) {
        throw new NotFoundError(`container not found: ${name}`, { cause: error });
      }
      throw new ExecutionFailureError(`docker request failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
