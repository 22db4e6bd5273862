import type { Config } from "./config.js";
import type { ConsoleIO } from "./console/io.js";
import { getDescriptions } from "./console/locale.js";
import { createCommandRegistry } from "./console/registry.js";
import { Session } from "./console/session.js";
import { BasicController } from "./controller/basic.js";

export interface AppOptions {
  config: Config;
  io: ConsoleIO;
  clock?: () => Date;
}

/**
 * Wire controller, registry and session for one run. The controller's
 * `exit` ends the session as soon as the command returns.
 */
export function createSession(opts: AppOptions): {
  session: Session;
  controller: BasicController;
} {
  const descriptions = getDescriptions(opts.config.locale);

  const controller = new BasicController({
    io: opts.io,
    descriptions,
    outputPath: opts.config.outputPath,
    onExit: () => session.end(),
  });
  const session = new Session({
    user: opts.config.user,
    registry: createCommandRegistry(controller, descriptions),
    io: opts.io,
    clock: opts.clock,
  });

  return { session, controller };
}
