import { z } from "zod"; // zod: the environment is external input like argv.

// Secrets may be supplied through the environment instead of argv, where
// they would show up in the process list.
export const ProbeEnvV1Z = z.object({
  UPSMON_COMMUNITY: z.string().min(1).optional(),
  UPSMON_USERNAME: z.string().min(1).optional(),
  UPSMON_AUTH_PASSWORD: z.string().min(1).optional(),
  UPSMON_PRIV_PASSWORD: z.string().min(1).optional()
}); // Not strict: the rest of the environment is ignored.

export type EnvFallbacksV1 = {
  community?: string;
  username?: string;
  authpassword?: string;
  privpassword?: string;
};

/**
 * Option values taken from the environment. Empty variables count as unset.
 */
export function readEnvFallbacksV1(env: Record<string, string | undefined>): EnvFallbacksV1 {
  const blankAsUnset = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = ProbeEnvV1Z.parse(blankAsUnset);
  return {
    community: parsed.UPSMON_COMMUNITY,
    username: parsed.UPSMON_USERNAME,
    authpassword: parsed.UPSMON_AUTH_PASSWORD,
    privpassword: parsed.UPSMON_PRIV_PASSWORD
  };
}
