import { z } from "zod";

const RecordIdZod = z.union([z.string(), z.number()]);

/** One row of a run's results.json, as written by the experiment runner. */
export const ResultRecordZod = z.object({
  image_id: RecordIdZod.optional(),
  id: RecordIdZod.optional(),
  ground_truth: z.string(),
  prediction: z.string(),
});

export type ResultRecord = z.infer<typeof ResultRecordZod>;

export interface Sample {
  readonly id: string;
  readonly groundTruth: string;
  readonly rawPrediction: string;
}

export function toSample(record: ResultRecord, index: number): Sample {
  return Object.freeze({
    id: String(record.image_id ?? record.id ?? `sample_${index}`),
    groundTruth: record.ground_truth,
    rawPrediction: record.prediction,
  });
}
