// src/shared/shutdown.ts
import type { Server } from "http";
import { log } from "../logger";

export interface ShutdownOpts {
  timeoutMs?: number;
  /** runs before the server closes (stop timers, flush) */
  onClose?: () => void;
}

export function enableGracefulShutdown(server: Server, opts: ShutdownOpts = {}) {
  const timeoutMs = Math.max(1000, opts.timeoutMs ?? 10_000);
  let closing = false;

  const onSignal = (sig: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    log.info({ sig }, "[shutdown] signal received; closing HTTP server");
    try {
      opts.onClose?.();
    } catch (err) {
      log.error({ err }, "[shutdown] close hook failed");
    }

    const t = setTimeout(() => {
      log.error("[shutdown] forced exit after timeout");
      process.exit(1);
    }, timeoutMs);
    t.unref?.();

    server.close((err) => {
      clearTimeout(t);
      if (err) {
        log.error({ err }, "[shutdown] close error");
        process.exit(1);
      }
      log.info("[shutdown] closed cleanly");
      process.exit(0);
    });
  };

  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
  signals.forEach((s) => process.on(s, onSignal));

  process.on("unhandledRejection", (err) => log.error({ err }, "[unhandledRejection]"));
  process.on("uncaughtException", (err) => log.error({ err }, "[uncaughtException]"));
}
