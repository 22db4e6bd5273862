#!/usr/bin/env node
import { createSession } from "./app.js";
import { loadConfig } from "./config.js";
import { createConsoleIO } from "./console/io.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const io = createConsoleIO();
  const { session } = createSession({ config, io });

  try {
    await session.begin();
  } finally {
    io.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
