import { z } from 'zod';

// Should be used instead of referencing process directly in case we don't
// run in node.js
export function safelyAccessEnvVar(name: string, toLowerCase = false) {
  try {
    return toLowerCase ? process.env[name]?.toLowerCase() : process.env[name];
  } catch {
    return undefined;
  }
}

const envScheme = z.object({
  LOG_LEVEL: z.string().optional(),
  LOG_FORMAT: z.string().optional(),
  RELAYER_CONFIG: z.string().optional(),
});

export type IchainEnv = z.infer<typeof envScheme>;

export function readIchainEnv(): IchainEnv {
  const parsedEnv = envScheme.safeParse(process.env);
  return parsedEnv.success ? parsedEnv.data : {};
}
