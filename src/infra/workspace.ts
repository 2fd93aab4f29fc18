import type { Config } from "../config";
import { makeLogger, type ILogger } from "../logging";
import { ActorSession } from "../model/session";
import type { ActorId } from "../types/brands";
import { FsSubstrate } from "./fsSubstrate";
import { ThreadStore } from "./store";

export interface Workspace {
  readonly logger: ILogger;
  readonly store: ThreadStore;
  readonly session: ActorSession;
}

/**
 * Wires a directory-backed store and a session for `actor` on the configured
 * device, resuming from whatever that actor has already published.
 */
export const openWorkspace = async (
  config: Config,
  actor: ActorId,
  logger: ILogger = makeLogger(config.logLevel, { pretty: config.logPretty }),
): Promise<Workspace> => {
  const store = new ThreadStore(new FsSubstrate(config.dir), { logger });
  const session = new ActorSession(actor, config.device, await store.loadSlice(actor));
  logger.debug({ actor, device: config.device, dir: config.dir }, "workspace opened");
  return { logger, store, session };
};
