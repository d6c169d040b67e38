#!/usr/bin/env node
import { pino } from "pino";
import { startStowage } from "./app.js";

const server = await startStowage();

const shutdown = () => {
  server.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      pino().error({ err }, "Failed to stop cleanly");
      process.exit(1);
    },
  );
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
