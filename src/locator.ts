import { err, noVdcSelected, ok, type Result } from './errors.js';
import type { SessionContext } from './session.js';
import { Platform } from './vcd/platform.js';
import { Vdc } from './vcd/vdc.js';

export type ResourceScope = 'platform' | 'vdc';

// Neither lookup contacts the server.

export function resolvePlatform(session: SessionContext): Platform {
  return new Platform(session.client);
}

export function resolveVdc(session: SessionContext): Result<Vdc> {
  if (!session.selectedVdcHref) {
    return err(noVdcSelected());
  }
  return ok(new Vdc(session.client, session.selectedVdcHref));
}
