/**
 * HarborGate CLI context
 * Shared loading of configuration and gateway for commands
 */

import { Command } from 'commander';
import { ConfigStore } from '../storage/ConfigStore';
import { createGateway, Gateway, GatewayOptions } from '../gateway';

export interface GlobalOptions {
  config?: string;
}

/** Walk up to the root program and read its global options. */
export function globalOptions(command: Command): GlobalOptions {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }
  return root.opts<GlobalOptions>();
}

export async function loadGateway(command: Command, options: GatewayOptions = {}): Promise<Gateway> {
  const config = await ConfigStore.load(globalOptions(command).config);
  return createGateway(config, options);
}
