import { describe, expect, it } from "vitest";
import { PipelineBuilder } from "./builder";
import { cropFilter, decimationFilter, lasWriter } from "./stages";

describe("PipelineBuilder", () => {
    it("should not merge a single reader", () => {
        const pipeline = new PipelineBuilder(lasWriter("/data/out.las"))
            .addReader("/data/a.las")
            .build();

        expect(pipeline).toEqual({
            pipeline: [
                { type: "readers.las", filename: "/data/a.las" },
                { type: "writers.las", filename: "/data/out.las" },
            ],
        });
    });

    it("should merge several readers before the filters", () => {
        const pipeline = new PipelineBuilder(lasWriter("/data/out.las"))
            .addReaders(["/data/a.las", "/data/b.las"])
            .addFilter(cropFilter("POLYGON ((0 0, 1 0, 1 1, 0 0))"))
            .addFilter(decimationFilter(5))
            .build();

        expect(pipeline.pipeline.map((stage) => stage.type)).toEqual([
            "readers.las",
            "readers.las",
            "filters.merge",
            "filters.crop",
            "filters.decimation",
            "writers.las",
        ]);
    });

    it("should end with the writer even without readers", () => {
        const pipeline = new PipelineBuilder(lasWriter("out.las")).build();

        expect(pipeline.pipeline).toEqual([
            { type: "writers.las", filename: "out.las" },
        ]);
    });
});
