import z from "zod";

export const DemTypeSchema = z.enum(["density", "dsm", "dtm"]);

export type DemType = z.infer<typeof DemTypeSchema>;

/** Output path per product, e.g. `{ max: "/out/dsm_r0.56.max.tif" }`. */
export type DemOutputs = Record<string, string>;

const PRODUCTS: Record<DemType, readonly string[]> = {
    density: ["den"],
    dsm: ["max"],
    dtm: ["idw"],
};

export function demProducts(demType: DemType): string[] {
    return [...PRODUCTS[demType]];
}
