import type {
    CropFilter,
    DecimationFilter,
    FilterStage,
    GdalWriter,
    LasReader,
    LasWriter,
    MergeFilter,
    OutlierFilter,
    RangeFilter,
} from "./schema";

export type ClassificationEquality = "equals" | "max";

export function lasReader(filename: string): LasReader {
    return { type: "readers.las", filename };
}

export function mergeFilter(): MergeFilter {
    return { type: "filters.merge" };
}

export function decimationFilter(step: number): DecimationFilter {
    return { type: "filters.decimation", step };
}

/** Keeps points of one classification, or of every class up to it. */
export function classificationFilter(
    classification: number,
    equality: ClassificationEquality = "equals",
): RangeFilter {
    const limits =
        equality === "max"
            ? `Classification[:${classification}]`
            : `Classification[${classification}:${classification}]`;
    return { type: "filters.range", limits };
}

export function outlierFilter(meanK = 20, multiplier = 3.0): OutlierFilter {
    return {
        type: "filters.outlier",
        method: "statistical",
        mean_k: meanK,
        multiplier,
    };
}

export function maxZFilter(maxZ: number): RangeFilter {
    return { type: "filters.range", limits: `Z[:${maxZ}]` };
}

export function scanAngleFilter(maxAbsAngle: number): RangeFilter {
    return {
        type: "filters.range",
        limits: `ScanAngleRank[${-maxAbsAngle}:${maxAbsAngle}]`,
    };
}

export function scanEdgeFilter(value: number): RangeFilter {
    return {
        type: "filters.range",
        limits: `EdgeOfFlightLine[${value}:${value}]`,
    };
}

export function returnNumFilter(value: number): RangeFilter {
    return { type: "filters.range", limits: `ReturnNum[${value}:${value}]` };
}

export function cropFilter(wkt: string): CropFilter {
    return { type: "filters.crop", polygon: wkt };
}

export type PointFilterOptions = {
    /** Outlier threshold, in standard deviations. */
    maxsd?: number | undefined;
    maxz?: number | undefined;
    maxangle?: number | undefined;
    returnnum?: number | undefined;
};

/** The optional point filters, in the order they run. */
export function pointFilters(options: PointFilterOptions): FilterStage[] {
    const filters: FilterStage[] = [];
    if (options.returnnum !== undefined) {
        filters.push(returnNumFilter(options.returnnum));
    }
    if (options.maxangle !== undefined) {
        filters.push(scanAngleFilter(options.maxangle));
    }
    if (options.maxz !== undefined) {
        filters.push(maxZFilter(options.maxz));
    }
    if (options.maxsd !== undefined) {
        filters.push(outlierFilter(undefined, options.maxsd));
    }
    return filters;
}

/**
 * Raster writer for `<base>.<output>.tif`. Only one output per pipeline
 * is supported; extra outputs are announced and dropped.
 */
export function gdalWriter(
    base: string,
    outputs: readonly string[],
    radius: string,
    resolution = 1,
): GdalWriter {
    const [output] = outputs;
    if (output === undefined) {
        throw new Error("A GDAL writer needs at least one output type");
    }
    if (outputs.length > 1) {
        console.log(`More than 1 output, will only create ${output}`);
    }

    return {
        type: "writers.gdal",
        resolution,
        radius,
        filename: `${base}.${output}.tif`,
        output_type: output,
    };
}

export function lasWriter(filename: string): LasWriter {
    return { type: "writers.las", filename };
}
