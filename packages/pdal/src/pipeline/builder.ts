import type { FilterStage, Pipeline, WriterStage } from "./schema";
import { lasReader, mergeFilter } from "./stages";

/**
 * Assembles a pipeline in execution order: readers, a merge when there is
 * more than one reader, the filters as added, then the writer.
 */
export class PipelineBuilder {
    private readonly readers: string[] = [];
    private readonly filters: FilterStage[] = [];

    constructor(private readonly writer: WriterStage) {}

    addReader(filename: string): this {
        this.readers.push(filename);
        return this;
    }

    addReaders(filenames: readonly string[]): this {
        for (const filename of filenames) {
            this.addReader(filename);
        }
        return this;
    }

    addFilter(...filters: FilterStage[]): this {
        this.filters.push(...filters);
        return this;
    }

    build(): Pipeline {
        return {
            pipeline: [
                ...this.readers.map((filename) => lasReader(filename)),
                ...(this.readers.length > 1 ? [mergeFilter()] : []),
                ...this.filters,
                this.writer,
            ],
        };
    }
}
