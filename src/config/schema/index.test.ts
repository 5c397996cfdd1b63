import { describe, expect, it } from "vitest";
import { HarbormasterConfigSchema } from "./index";

describe("HarbormasterConfigSchema", () => {
  it("normalizes numeric ids in access lists to strings", () => {
    const result = HarbormasterConfigSchema.safeParse({
      access: {
        allowedGuilds: [123456789, "987"],
        allowedChannels: ["42"],
      },
    });

    expect(result.success).toBe(true);
    if (!result.success) {
      return;
    }
    expect(result.data.access?.allowedGuilds).toEqual(["123456789", "987"]);
    expect(result.data.access?.allowedChannels).toEqual(["42"]);
  });

  it("accepts numeric ports and keeps them as strings", () => {
    const result = HarbormasterConfigSchema.safeParse({
      containers: [{ name: "minecraft", port: 25565 }],
    });

    expect(result.success).toBe(true);
    if (!result.success) {
      return;
    }
    expect(result.data.containers?.[0]?.port).toBe("25565");
  });

  it("rejects duplicate container names regardless of case", () => {
    const result = HarbormasterConfigSchema.safeParse({
      containers: [{ name: "valheim" }, { name: "Valheim" }],
    });

    expect(result.success).toBe(false);
    if (result.success) {
      return;
    }
    expect(result.error.issues[0]?.path).toEqual(["containers", 1, "name"]);
  });

  it("rejects container names containing whitespace", () => {
    const result = HarbormasterConfigSchema.safeParse({
      containers: [{ name: "two words" }],
    });

    expect(result.success).toBe(false);
  });

  it("rejects unknown runtime backends", () => {
    const result = HarbormasterConfigSchema.safeParse({
      runtime: { backend: "lxc" },
    });

    expect(result.success).toBe(false);
  });

  it("rejects unknown top-level keys", () => {
    const result = HarbormasterConfigSchema.safeParse({
      agents: {},
    });

    expect(result.success).toBe(false);
  });
});
