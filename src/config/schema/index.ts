import { z } from "zod";
import { AccessSchema } from "./access";
import { ChannelsSchema } from "./channels";
import { ContainersSchema } from "./containers";
import { LoggingSchema } from "./logging";
import { PathsSchema } from "./paths";
import { CommandsConfigSchema, PublicAddressSchema, RuntimeConfigSchema } from "./runtime";

export const HarbormasterConfigSchema = z
  .object({
    $schema: z.string().optional(),
    $include: z.union([z.string(), z.array(z.string())]).optional(),
    paths: PathsSchema.optional(),
    logging: LoggingSchema.optional(),
    channels: ChannelsSchema.optional(),
    access: AccessSchema.optional(),
    runtime: RuntimeConfigSchema.optional(),
    commands: CommandsConfigSchema.optional(),
    publicAddress: PublicAddressSchema.optional(),
    containers: ContainersSchema.optional(),
  })
  .strict();

export type HarbormasterConfig = z.infer<typeof HarbormasterConfigSchema>;
export type { ContainerEntry } from "./containers";
