import { z } from "zod";

export const ConfigSchema = z.object({
	platform: z.enum(["posix", "win32"]).optional(),
	nulBytes: z.enum(["strip", "reject", "preserve"]).default("strip"),
	base: z.string().min(1).optional(),
});

export type SlipguardConfig = z.infer<typeof ConfigSchema>;
