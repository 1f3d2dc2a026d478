import type { Collaborators } from "@meridian/core";
import { getErrorMessage } from "@meridian/errors";
import { type HubConfig, loadConfig } from "./config.js";
import { createCollaborators, createHub, type Hub, type HubOptions } from "./hub.js";
import { HubServer } from "./http/hub-server.js";

export interface RunningHub {
  readonly config: HubConfig;
  readonly hub: Hub;
  readonly server: HubServer;
  /** Stop accepting requests, drain background work, close the backend. */
  shutdown(): Promise<void>;
}

export interface StartOptions extends HubOptions {
  /** Defaults to the HTTP clients built from the configuration. */
  readonly collaborators?: Collaborators;
}

/**
 * Load configuration from `env`, compose the hub and start its HTTP API.
 * @throws ConfigurationInvalidError before anything is started
 */
export async function startHub(
  env: Readonly<Record<string, string | undefined>>,
  options: StartOptions = {},
): Promise<RunningHub> {
  const config = loadConfig(env);
  const collaborators = options.collaborators ?? createCollaborators(config, options.sleep);
  const hub = await createHub(config, collaborators, options);
  const server = new HubServer(hub, {
    port: config.http.port,
    hostname: config.http.host,
    adminToken: config.adminToken,
    matrixHomeserver: config.matrix.homeserver,
    apiBase: config.apiBase,
  });

  try {
    await server.start();
  } catch (error) {
    await hub.close();
    throw error;
  }
  if (config.adminToken === null) {
    console.warn("[Hub] MERIDIAN_ADMIN_TOKEN is not set; admin routes are disabled");
  }
  console.info(
    `[Hub] Listening on ${config.http.host}:${server.port} (storage: ${config.storage.kind}, rooms: ${config.roomPolicy})`,
  );

  let stopping: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      try {
        await server.stop();
      } finally {
        await hub.close();
      }
      console.info("[Hub] Stopped");
    })();
    return stopping;
  };

  return { config, hub, server, shutdown };
}

/** Process entry: start, then shut down cleanly on SIGINT or SIGTERM. */
export async function main(): Promise<void> {
  const running = await startHub(process.env);
  const onSignal = (signal: NodeJS.Signals): void => {
    console.info(`[Hub] ${signal} received, shutting down`);
    void running.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`[Hub] Shutdown failed: ${getErrorMessage(error)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}
