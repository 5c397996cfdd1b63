import { z } from "zod";

export const IdListSchema = z
  .array(z.union([z.string(), z.number()]))
  .transform((items) => items.map((item) => item.toString().trim()).filter(Boolean));

export const DiscordConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    botToken: z.string().optional(),
  })
  .strict();

export const ChannelsSchema = z
  .object({
    discord: DiscordConfigSchema.optional(),
  })
  .strict();
