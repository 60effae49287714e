/**
 * Environment configuration
 * AnkiConnect endpoint settings read from process.env
 */

import { z } from "zod";

export const DEFAULT_ANKI_CONNECT_URL = "http://127.0.0.1:8765";

const environmentSchema = z.object({
  ANKI_CONNECT_URL: z.string().url().default(DEFAULT_ANKI_CONNECT_URL),
  ANKI_CONNECT_VERSION: z.coerce.number().int().positive().default(6),
  // Only needed when AnkiConnect is configured with "apiKey"
  ANKI_CONNECT_KEY: z.string().min(1).optional(),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Validates the environment and fills in defaults.
 */
export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const result = environmentSchema.safeParse(source);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid AnkiConnect configuration: ${details}`);
  }

  return result.data;
}
