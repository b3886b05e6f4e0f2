import { randomUUID } from "node:crypto";
import path from "node:path";
import {
    formatCommandLine,
    isNotFoundError,
    NodeSystem,
    type System,
} from "@l2d/system-interface";
import { type DemOutputs, type DemType, demProducts } from "./dem/products";
import { formatElapsed } from "./elapsed";
import { PdalCommandError, PdalOperationError } from "./errors";
import {
    type ClassifyOptions,
    ClassifyOptionsSchema,
    type DemOptions,
    DemOptionsSchema,
    type DemsOptions,
    DemsOptionsSchema,
    type GroundOptions,
    GroundOptionsSchema,
    type MergeOptions,
    MergeOptionsSchema,
    parseOptions,
} from "./options";
import {
    classificationFilter,
    cropFilter,
    decimationFilter,
    gdalWriter,
    lasWriter,
    type Pipeline,
    PipelineBuilder,
    pointFilters,
} from "./pipeline";

export type PdalSettings = {
    /** The pdal executable, looked up on PATH unless it is a path. */
    executable?: string;
    /** Millisecond clock used for the elapsed times in progress lines. */
    clock?: () => number;
};

/**
 * Runs PDAL pipelines and the DEM workflows built on them. Paths are
 * resolved against the current directory of the given system.
 */
export class Pdal {
    private readonly executable: string;
    private readonly clock: () => number;

    constructor(
        private readonly system: System,
        settings: PdalSettings = {},
    ) {
        this.executable = settings.executable ?? "pdal";
        this.clock = settings.clock ?? Date.now;
    }

    static async create(settings: PdalSettings = {}): Promise<Pdal> {
        return new Pdal(await NodeSystem.create(), settings);
    }

    /**
     * Writes the pipeline to a temporary file and runs `pdal pipeline` on
     * it. Output is shown only when verbose. The file is always removed.
     */
    async runPipeline(pipeline: Pipeline, verbose = false): Promise<void> {
        if (verbose) {
            console.log(JSON.stringify(pipeline, null, 4));
        }

        const file = path.join(
            this.system.proc.tempDir(),
            `pipeline-${randomUUID()}.json`,
        );
        if (verbose) {
            console.log(`Pipeline file: ${file}`);
        }
        await this.system.fs.writeStringToFile(file, JSON.stringify(pipeline));

        try {
            await this.pdal(["pipeline", "-i", file], verbose);
        } finally {
            await this.system.fs.remove(file);
        }
    }

    /** Classifies ground points of `input` into `output` with `pdal ground`. */
    async ground(
        input: string,
        output: string,
        options: GroundOptions = {},
    ): Promise<void> {
        const opts = parseOptions("ground", GroundOptionsSchema, options);

        const args = ["ground", "-i", input, "-o", output];
        if (opts.slope !== undefined) {
            args.push("--slope", String(opts.slope));
        }
        if (opts.cellSize !== undefined) {
            args.push("--cell_size", String(opts.cellSize));
        }
        if (opts.maxWindowSize !== undefined) {
            args.push("--max_window_size", String(opts.maxWindowSize));
        }
        if (opts.maxDistance !== undefined) {
            args.push("--max_distance", String(opts.maxDistance));
        }
        if (opts.approximate) {
            args.push("--approximate");
        }
        if (opts.verbose) {
            args.push("--developer-debug");
        }

        console.log(formatCommandLine(this.executable, args));
        await this.pdal(args, true);
    }

    /**
     * Merges LAS files into one, optionally cropped to the buffered site
     * and decimated. Without `fout` the result is a uniquely named file
     * beside the first input.
     */
    async mergeFiles(
        filenames: readonly string[],
        options: MergeOptions = {},
    ): Promise<string> {
        const opts = parseOptions("mergeFiles", MergeOptionsSchema, options);
        const start = this.clock();

        const [first] = filenames;
        if (first === undefined) {
            throw new PdalOperationError("No LAS files to merge");
        }
        const fout = opts.fout
            ? this.absolute(opts.fout)
            : path.join(
                  path.dirname(this.absolute(first)),
                  `${randomUUID()}.las`,
              );

        const builder = new PipelineBuilder(lasWriter(fout));
        if (opts.site) {
            builder.addFilter(cropFilter(opts.site.bufferedWkt(opts.buffer)));
        }
        if (opts.decimation !== undefined) {
            builder.addFilter(decimationFilter(opts.decimation));
        }
        builder.addReaders(filenames.map((f) => this.absolute(f)));

        try {
            await this.runPipeline(builder.build(), opts.verbose);
        } catch (e) {
            throw new PdalOperationError("Error merging LAS files", {
                cause: e,
            });
        }

        console.log(
            `Created merged file ${this.relative(fout)} in ${this.elapsedSince(start)}`,
        );
        return fout;
    }

    /**
     * Merges the inputs into a temporary file and classifies it into a
     * single LAS file.
     */
    async classify(
        filenames: readonly string[],
        fout: string,
        options: ClassifyOptions = {},
    ): Promise<string> {
        const opts = parseOptions("classify", ClassifyOptionsSchema, options);
        const start = this.clock();

        console.log(
            `Classifying ${filenames.length} files into ${this.relative(fout)}`,
        );

        const merged = await this.mergeFiles(filenames, {
            site: opts.site,
            buffer: opts.buffer,
            decimation: opts.decimation,
            verbose: opts.verbose,
        });

        try {
            await this.ground(merged, fout, {
                slope: opts.slope,
                cellSize: opts.cellSize,
                maxWindowSize: opts.maxWindowSize,
                maxDistance: opts.maxDistance,
                approximate: opts.approximate,
                verbose: opts.verbose,
            });
            if (!(await this.system.fs.pathExists(fout))) {
                throw new PdalOperationError(`${fout} was not written`);
            }
        } catch (e) {
            throw new PdalOperationError(
                `Error creating classified file ${fout}`,
                { cause: e },
            );
        } finally {
            await this.system.fs.remove(merged);
        }

        console.log(
            `Created ${this.relative(fout)} in ${this.elapsedSince(start)}`,
        );
        return fout;
    }

    /**
     * Creates the rasters of one DEM type at one radius. Products that
     * already exist, under any extension, are kept unless `overwrite` is
     * set; the pipeline runs when at least one is missing.
     */
    async createDem(
        filenames: readonly string[],
        demType: DemType,
        options: DemOptions = {},
    ): Promise<DemOutputs> {
        const opts = parseOptions("createDem", DemOptionsSchema, options);
        const start = this.clock();

        const base = path.join(
            this.absolute(opts.outdir),
            `${sitePrefix(opts.site?.basename)}${demType}_r${opts.radius}${opts.suffix}`,
        );
        const products = opts.products ?? demProducts(demType);
        const outputs: DemOutputs = Object.fromEntries(
            products.map((product) => [product, `${base}.${product}.tif`]),
        );
        const pretty = `${this.relative(base)} [${products.join(" ")}]`;

        let run = opts.overwrite;
        for (const product of products) {
            if (!(await this.hasAnyVersion(`${base}.${product}.`))) {
                run = true;
            }
        }

        if (run) {
            console.log(`Creating ${pretty} from ${filenames.length} files`);

            const builder = new PipelineBuilder(
                gdalWriter(base, products, opts.radius, opts.resolution),
            );
            if (demType === "dsm") {
                builder.addFilter(classificationFilter(2, "max"));
            } else if (demType === "dtm") {
                builder.addFilter(classificationFilter(2));
            }
            builder.addFilter(...pointFilters(opts));
            if (opts.decimation !== undefined) {
                builder.addFilter(decimationFilter(opts.decimation));
            }
            builder.addReaders(filenames.map((f) => this.absolute(f)));

            await this.runPipeline(builder.build(), opts.verbose);

            const missing: string[] = [];
            for (const output of Object.values(outputs)) {
                if (!(await this.system.fs.pathExists(output))) {
                    missing.push(output);
                }
            }
            if (missing.length) {
                throw new PdalOperationError(
                    `Error creating dems: ${missing.join(" ")}`,
                );
            }
        }

        console.log(`Completed ${pretty} in ${this.elapsedSince(start)}`);
        return outputs;
    }

    /**
     * Creates a DEM per radius. With a gap filler, every product except
     * density is gap-filled across the radii into one raster; otherwise,
     * and for density, the first radius is returned.
     */
    async createDems(
        filenames: readonly string[],
        demType: DemType,
        options: DemsOptions = {},
    ): Promise<DemOutputs> {
        const { radius, gapFill, ...rest } = parseOptions(
            "createDems",
            DemsOptionsSchema,
            options,
        );

        const runs: DemOutputs[] = [];
        for (const r of radius) {
            runs.push(
                await this.createDem(filenames, demType, {
                    ...rest,
                    radius: r,
                }),
            );
        }

        const byProduct = new Map<string, string[]>();
        for (const run of runs) {
            for (const [product, output] of Object.entries(run)) {
                byProduct.set(product, [
                    ...(byProduct.get(product) ?? []),
                    output,
                ]);
            }
        }

        const outputs: DemOutputs = {};
        for (const [product, files] of byProduct) {
            const [firstRadius] = files;
            if (firstRadius === undefined) {
                continue;
            }
            if (!gapFill || product === "den") {
                outputs[product] = firstRadius;
                continue;
            }

            const fout = path.join(
                this.absolute(rest.outdir),
                `${sitePrefix(rest.site?.basename)}${demType}${rest.suffix}.${product}.tif`,
            );
            if (rest.overwrite || !(await this.system.fs.pathExists(fout))) {
                await gapFill(files, fout, rest.site);
            }
            outputs[product] = fout;
        }

        return outputs;
    }

    private async pdal(args: string[], showOutput: boolean): Promise<void> {
        const result = await this.system.cmd.run(this.executable, args, {
            stdio: showOutput ? "inherit" : "ignore",
        });
        if (result.exitCode !== 0) {
            throw new PdalCommandError(
                this.executable,
                args,
                result.exitCode,
            );
        }
    }

    /** Whether `<stem>*` exists, `stem` ending right before the extension. */
    private async hasAnyVersion(stem: string): Promise<boolean> {
        const dir = path.dirname(stem);
        const prefix = path.basename(stem);

        let entries: string[];
        try {
            entries = await this.system.fs.readDirectory(dir);
        } catch (e) {
            if (isNotFoundError(e)) {
                return false;
            }
            throw e;
        }

        return entries.some((entry) => entry.startsWith(prefix));
    }

    private absolute(p: string): string {
        return path.resolve(this.system.proc.currentDir(), p);
    }

    private relative(p: string): string {
        return path.relative(this.system.proc.currentDir(), this.absolute(p));
    }

    private elapsedSince(start: number): string {
        return formatElapsed(this.clock() - start);
    }
}

function sitePrefix(basename: string | undefined): string {
    return basename === undefined ? "" : `${basename}_`;
}
