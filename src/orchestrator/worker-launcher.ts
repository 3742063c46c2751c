import type { Session } from '../session/types.js';

/**
 * Starts and stops the external process that does a session's work. The
 * returned handle is opaque to the core and stored on the session.
 */
export interface WorkerLauncher {
  launch(session: Session, contract: string): Promise<string>;
  terminate(handle: string): Promise<void>;
  isAlive(handle: string): Promise<boolean>;
}
