import z from "zod";
import { InvalidOptionsError } from "./errors";
import { isSite, type Site } from "./site";

export type GapFill = (
    inputs: string[],
    output: string,
    site: Site | undefined,
) => Promise<void>;

const SiteSchema = z.custom<Site>(isSite, {
    message: "Expected a site with a basename and bufferedWkt()",
});

const GapFillSchema = z.custom<GapFill>(
    (value) => typeof value === "function",
    { message: "Expected a gap fill function" },
);

const RadiusSchema = z
    .union([z.string().min(1), z.number().positive()])
    .transform(String);

export const GroundOptionsSchema = z.object({
    slope: z.number().positive().optional(),
    cellSize: z.number().positive().optional(),
    maxWindowSize: z.number().positive().optional(),
    maxDistance: z.number().positive().optional(),
    approximate: z.boolean().default(false),
    verbose: z.boolean().default(false),
});

export const MergeOptionsSchema = z.object({
    fout: z.string().min(1).optional(),
    site: SiteSchema.optional(),
    /** Distance the site outline grows by before cropping. */
    buffer: z.number().nonnegative().default(20),
    decimation: z.number().int().positive().optional(),
    verbose: z.boolean().default(false),
});

export const ClassifyOptionsSchema = MergeOptionsSchema.omit({
    fout: true,
}).extend({
    slope: z.number().positive().optional(),
    cellSize: z.number().positive().optional(),
    maxWindowSize: z.number().positive().default(10),
    maxDistance: z.number().positive().default(1),
    approximate: z.boolean().default(false),
});

const DemBaseOptionsSchema = z.object({
    site: SiteSchema.optional(),
    decimation: z.number().int().positive().optional(),
    maxsd: z.number().positive().optional(),
    maxz: z.number().optional(),
    maxangle: z.number().nonnegative().optional(),
    returnnum: z.number().int().positive().optional(),
    products: z.array(z.string().min(1)).nonempty().optional(),
    outdir: z.string().default(""),
    suffix: z.string().default(""),
    overwrite: z.boolean().default(false),
    verbose: z.boolean().default(false),
    resolution: z.number().positive().default(0.1),
});

export const DemOptionsSchema = DemBaseOptionsSchema.extend({
    radius: RadiusSchema.default("0.56"),
});

export const DemsOptionsSchema = DemBaseOptionsSchema.extend({
    radius: z.array(RadiusSchema).nonempty().default(["0.56"]),
    gapFill: GapFillSchema.optional(),
});

export type GroundOptions = z.input<typeof GroundOptionsSchema>;
export type MergeOptions = z.input<typeof MergeOptionsSchema>;
export type ClassifyOptions = z.input<typeof ClassifyOptionsSchema>;
export type DemOptions = z.input<typeof DemOptionsSchema>;
export type DemsOptions = z.input<typeof DemsOptionsSchema>;

export function parseOptions<TOut, TIn>(
    operation: string,
    schema: z.ZodType<TOut, z.ZodTypeDef, TIn>,
    options: TIn,
): TOut {
    const parsed = schema.safeParse(options);

    if (parsed.success) {
        return parsed.data;
    } else {
        throw new InvalidOptionsError(operation, parsed.error.message);
    }
}
