import z from "zod";

export const LasReaderSchema = z.object({
    type: z.literal("readers.las"),
    filename: z.string().min(1),
});

export const MergeFilterSchema = z.object({
    type: z.literal("filters.merge"),
});

export const RangeFilterSchema = z.object({
    type: z.literal("filters.range"),
    limits: z.string().min(1),
});

export const OutlierFilterSchema = z.object({
    type: z.literal("filters.outlier"),
    method: z.literal("statistical"),
    mean_k: z.number().int().positive(),
    multiplier: z.number().positive(),
});

export const DecimationFilterSchema = z.object({
    type: z.literal("filters.decimation"),
    step: z.number().int().positive(),
});

export const CropFilterSchema = z.object({
    type: z.literal("filters.crop"),
    polygon: z.string().min(1),
});

export const GdalWriterSchema = z.object({
    type: z.literal("writers.gdal"),
    resolution: z.number().positive(),
    radius: z.string().min(1),
    filename: z.string().min(1),
    output_type: z.string().min(1),
});

export const LasWriterSchema = z.object({
    type: z.literal("writers.las"),
    filename: z.string().min(1),
});

export const FilterStageSchema = z.discriminatedUnion("type", [
    MergeFilterSchema,
    RangeFilterSchema,
    OutlierFilterSchema,
    DecimationFilterSchema,
    CropFilterSchema,
]);

export const WriterStageSchema = z.discriminatedUnion("type", [
    GdalWriterSchema,
    LasWriterSchema,
]);

export const StageSchema = z.discriminatedUnion("type", [
    LasReaderSchema,
    MergeFilterSchema,
    RangeFilterSchema,
    OutlierFilterSchema,
    DecimationFilterSchema,
    CropFilterSchema,
    GdalWriterSchema,
    LasWriterSchema,
]);

export const PipelineSchema = z.object({
    pipeline: z.array(StageSchema),
});

export type LasReader = z.infer<typeof LasReaderSchema>;
export type MergeFilter = z.infer<typeof MergeFilterSchema>;
export type RangeFilter = z.infer<typeof RangeFilterSchema>;
export type OutlierFilter = z.infer<typeof OutlierFilterSchema>;
export type DecimationFilter = z.infer<typeof DecimationFilterSchema>;
export type CropFilter = z.infer<typeof CropFilterSchema>;
export type GdalWriter = z.infer<typeof GdalWriterSchema>;
export type LasWriter = z.infer<typeof LasWriterSchema>;
export type FilterStage = z.infer<typeof FilterStageSchema>;
export type WriterStage = z.infer<typeof WriterStageSchema>;
export type Stage = z.infer<typeof StageSchema>;
export type Pipeline = z.infer<typeof PipelineSchema>;

/**
 * Parses a serialized pipeline document.
 * @throws {InvalidPipelineError} when the JSON is malformed or a stage is unknown.
 */
export function parsePipeline(json: string): Pipeline {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (e) {
        throw new InvalidPipelineError(
            e instanceof Error ? e.message : String(e),
        );
    }

    const parsed = PipelineSchema.safeParse(raw);
    if (parsed.success) {
        return parsed.data;
    } else {
        throw new InvalidPipelineError(parsed.error.message);
    }
}

export class InvalidPipelineError extends Error {
    constructor(message: string) {
        super(`Invalid pipeline: ${message}`);
        super.name = this.constructor.name;
    }
}
