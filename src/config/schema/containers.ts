import { z } from "zod";

const PortSchema = z
  .union([z.string().min(1), z.number().int().positive().max(65535)])
  .transform((value) => value.toString());

export const ContainerEntrySchema = z
  .object({
    name: z
      .string()
      .trim()
      .min(1)
      .regex(/^\S+$/, "container name must be a single word"),
    container: z.string().trim().min(1).optional(),
    address: z.string().trim().min(1).optional(),
    port: PortSchema.optional(),
    password: z.string().optional(),
  })
  .strict();

export const ContainersSchema = z.array(ContainerEntrySchema).superRefine((entries, ctx) => {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    const key = entry.name.toLowerCase();
    if (seen.has(key)) {
      ctx.addIssue({
        code: "custom",
        path: [index, "name"],
        message: `duplicate container name "${entry.name}"`,
      });
    }
    seen.add(key);
  });
});

export type ContainerEntry = z.infer<typeof ContainerEntrySchema>;
