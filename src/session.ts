import type { VcdConfig } from './config.js';
import { authFailure, err, noVdcSelected, ok, toCliError, type Result } from './errors.js';
import { createLogger } from './logger.js';
import { VcdClient, type VcdTransport } from './vcd/client.js';

export interface SessionContext {
  readonly client: VcdTransport;
  readonly selectedVdcHref?: string;
}

export interface SessionRequest {
  requireVdcSelected: boolean;
}

export type RestoreSession = (request: SessionRequest) => Promise<Result<SessionContext>>;

const logger = createLogger('session');

/**
 * Rebuilds the per-invocation session from configuration. The vdc check
 * runs before anything contacts the server.
 */
export async function restoreSession(
  config: VcdConfig,
  request: SessionRequest,
  createClient: (config: VcdConfig) => VcdClient = (c) => new VcdClient(c)
): Promise<Result<SessionContext>> {
  if (request.requireVdcSelected && !config.vdcHref) {
    return err(noVdcSelected());
  }
  if (!config.baseUrl) {
    return err(authFailure('Not logged in: VCD_BASE_URL is not set'));
  }

  const client = createClient(config);
  try {
    await client.authenticate();
  } catch (error) {
    return err(toCliError(error));
  }
  logger.debug(`session established with ${config.baseUrl}`, { vdc: config.vdcHref });

  return ok({ client, selectedVdcHref: config.vdcHref });
}

export const sessionFromConfig =
  (config: VcdConfig): RestoreSession =>
  (request) =>
    restoreSession(config, request);
