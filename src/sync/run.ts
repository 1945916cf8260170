// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig, PublisherCredentials } from "../config";
import type { CursorStore } from "../store/cursor-store";
import { PublishClient } from "../publisher/client";
import { runSync } from "./orchestrator";
import type { SyncReport } from "./orchestrator";

export type SyncRunner = () => Promise<SyncReport>;

export type SyncRunnerDeps = {
  readonly store: CursorStore;
  readonly config: AppConfig;
  readonly credentials: PublisherCredentials;
  readonly logger: Logger;
};

/**
 * Builds the function the scheduler invokes. Each invocation logs in with a
 * fresh client, so a session lives exactly as long as one run.
 */
export function createSyncRunner(deps: SyncRunnerDeps): SyncRunner {
  const { config, credentials, logger, store } = deps;

  return async function runOnce(): Promise<SyncReport> {
    const client = new PublishClient({
      serviceUrl: config.publisher.serviceUrl,
      timeoutMs: config.http.timeoutMs,
      logger,
    });

    await client.login(credentials.identifier, credentials.password);

    return runSync({
      store,
      publisher: client,
      http: config.http,
      textPrefix: config.post.textPrefix,
      logger,
    });
  };
}
