import { z } from "zod";
import { IdListSchema } from "./channels";

// Empty guild or channel lists are valid here; the access filter treats them as deny-all.
export const AccessSchema = z
  .object({
    allowedGuilds: IdListSchema.optional(),
    allowedChannels: IdListSchema.optional(),
    allowedUsers: IdListSchema.optional(),
    replyOnDenied: z.boolean().optional(),
  })
  .strict();
