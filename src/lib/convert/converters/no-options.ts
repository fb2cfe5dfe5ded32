import { z } from "zod";

/** Schema for converters that take no options; any key is rejected. */
export const noOptionsSchema = z.object({}).strict();

export type NoOptions = z.infer<typeof noOptionsSchema>;
