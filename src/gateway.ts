/**
 * HarborGate Bootstrap
 * Wires a configuration into the policy and its enforcement surfaces
 */

import { HarborGateConfig } from './types';
import { SecurityPolicy } from './core/SecurityPolicy';
import { ContainerGateway, ContainerRuntime } from './core/ContainerGateway';
import { HostCommandExecutor } from './core/HostCommandExecutor';
import { logger, setLogLevel } from './core/Logger';
import { DockerRuntime, createDockerClient } from './docker/DockerRuntime';
import { HostToolRegistry } from './hosttools/HostToolRegistry';
import { ApprovalPipeline } from './hosttools/ApprovalPipeline';
import { AuditLog, AuditSink } from './storage/AuditLog';

export interface GatewayOptions {
  /** Container engine; a dockerode runtime is built from `config.docker` when omitted. */
  runtime?: ContainerRuntime;
  /** Audit destination; the JSON Lines audit log when omitted. */
  audit?: AuditSink;
  /** Turn container dangerous mode on for this process. */
  dangerously?: boolean;
  /** Serve host tools from staging directories too. */
  devMode?: boolean;
}

export interface Gateway {
  config: HarborGateConfig;
  policy: SecurityPolicy;
  containers: ContainerGateway;
  hostCommands: HostCommandExecutor;
  hostTools: HostToolRegistry;
  approval: ApprovalPipeline;
}

export function createGateway(config: HarborGateConfig, options: GatewayOptions = {}): Gateway {
  setLogLevel(config.logLevel);

  const basePolicy = new SecurityPolicy(config.security);
  const policy = options.dangerously ? basePolicy.withDangerousMode() : basePolicy;

  const audit = options.audit ?? AuditLog.sink();
  const runtime = options.runtime ?? new DockerRuntime(createDockerClient(config.docker));
  const workspaceRoot = config.hostAccess.workspaceRoot || process.cwd();

  const gateway: Gateway = {
    config,
    policy,
    containers: new ContainerGateway(policy, runtime, {
      execTimeoutMs: config.docker.execTimeoutMs,
      audit,
    }),
    hostCommands: new HostCommandExecutor(config.hostAccess.hostCommands, policy, { workspaceRoot, audit }),
    hostTools: new HostToolRegistry(config.hostAccess.hostTools, {
      workspaceRoot,
      devMode: options.devMode,
      policy,
      audit,
    }),
    approval: new ApprovalPipeline(config.hostAccess.hostTools, { workspaceRoot, audit }),
  };

  logger.info('Gateway ready', {
    mode: policy.mode,
    dangerousMode: policy.describe().dangerousMode.enabled,
    hostCommands: config.hostAccess.hostCommands.enabled,
    hostTools: gateway.hostTools.state,
  });

  return gateway;
}
