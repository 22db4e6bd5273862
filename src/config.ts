import { z } from "zod";
import { resolveLocale } from "./console/locale.js";

const configSchema = z.object({
  user: z.string().min(1).default("operator"),
  locale: z
    .string()
    .default(() => Intl.DateTimeFormat().resolvedOptions().locale)
    .transform(resolveLocale),
  outputPath: z.string().min(1).default("result.json"),
});

export type Config = z.infer<typeof configSchema>;

/** First value that is set and not empty. */
const first = (...values: (string | undefined)[]) =>
  values.find((v) => v != null && v !== "");

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    user: first(env.SCHEDULE_USER, env.USER),
    locale: first(env.SCHEDULE_LOCALE, env.LC_ALL, env.LANG),
    outputPath: first(env.SCHEDULE_OUTPUT),
  });
}
