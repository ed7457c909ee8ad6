// src/index.ts
//
// API bootstrap: config -> services -> express app -> listen.

import { createApp } from "./app";
import { config, summarizeConfig } from "./config";
import { log } from "./logger";
import { buildServices } from "./services";
import { enableGracefulShutdown } from "./shared/shutdown";

const startedAt = Date.now();
const services = buildServices(config);
services.cache.startSweeper(config.cache.sweepIntervalMs);

const app = createApp({ services, config, startedAt });

const server = app.listen(config.port, () => {
  log.info({ port: config.port, config: summarizeConfig(config), search: services.search.providerId, llm: services.chain.names }, "[api] listening");
});

enableGracefulShutdown(server, { onClose: () => services.cache.stop() });
