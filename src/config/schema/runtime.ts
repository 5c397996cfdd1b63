import { z } from "zod";

export const ContainerBackendSchema = z.enum(["docker", "podman"]);

export const RuntimeConfigSchema = z
  .object({
    backend: ContainerBackendSchema.optional(),
    host: z.string().min(1).optional(),
    binary: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().max(300_000).optional(),
    stopTimeoutSec: z.number().int().nonnegative().max(600).optional(),
  })
  .strict();

export const CommandsConfigSchema = z
  .object({
    logTailLines: z.number().int().positive().max(500).optional(),
    logMaxChars: z.number().int().positive().max(4000).optional(),
  })
  .strict();

export const PublicAddressSchema = z
  .object({
    lookupUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();
