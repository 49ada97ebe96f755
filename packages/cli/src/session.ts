/**
 * Session setup shared by all commands: configuration, logging and the
 * authenticated client.
 */

import { password } from '@inquirer/prompts';
import {
  Services,
  createLogService,
  getServiceRegistry,
  hasServiceRegistry,
  initServiceRegistry,
} from '@fireside/core';
import { FiresideClient, type Credentials } from '@fireside/client';
import { loadConfig, type AuthConfig, type CliConfig, type ConfigOverrides } from './config.js';

export interface Session {
  config: CliConfig;
  client: FiresideClient;
}

/**
 * Route library logging through a LogService configured for the CLI.
 */
export function setupLogging(config: Pick<CliConfig, 'logLevel' | 'logJson'>): void {
  const registry = hasServiceRegistry() ? getServiceRegistry() : initServiceRegistry();
  registry.register(Services.Log, createLogService({ level: config.logLevel, json: config.logJson }));
}

/**
 * Credentials for the client; prompts for a missing password.
 */
export async function resolveCredentials(auth: AuthConfig): Promise<Credentials> {
  if ('token' in auth) return { token: auth.token };
  if (auth.password !== null) return { username: auth.username, password: auth.password };

  const answer = await password({ message: `Password for ${auth.username}:`, mask: '*' });
  return { username: auth.username, password: answer };
}

export async function openSession(overrides: ConfigOverrides): Promise<Session> {
  const config = loadConfig(process.env, overrides);
  setupLogging(config);

  const client = await FiresideClient.connect({
    url: config.url,
    credentials: await resolveCredentials(config.auth),
    streamingUrl: config.streamingUrl,
  });
  return { config, client };
}
