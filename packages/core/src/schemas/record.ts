import { z } from 'zod';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

// A connector-defined unit of harvested data (a question, a blame line range)
export const RawRecordSchema = z.record(JsonValueSchema);

export const StampedRecordSchema = z.object({
  backend_name: z.string().min(1),
  backend_version: z.string().min(1),
  origin: z.string().min(1),
  uuid: z.string().regex(/^[0-9a-f]{64}$/),

  // Epoch seconds, UTC
  updated_on: z.number(),
  fetched_on: z.number(),

  data: RawRecordSchema
});

export type RawRecord = z.infer<typeof RawRecordSchema>;
export type StampedRecord = z.infer<typeof StampedRecordSchema>;
