import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeFileSync } from "node:fs";
import { inspectRayFile } from "../tools/ray-file-runner";
import { asciiRayText, buildHeaderBytes, buildRayBytes, concatBytes, createTempDir } from "./helpers/ray-fixtures";

describe("inspectRayFile", () => {
  let tmp: ReturnType<typeof createTempDir>;

  beforeEach(() => {
    tmp = createTempDir("ray-inspect-");
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("summarizes a binary header", async () => {
    const input = tmp.file("lamp.dat");
    writeFileSync(
      input,
      concatBytes(
        buildHeaderBytes({
          identifier: 1010,
          rayCount: 1,
          description: "lamp",
          floats7: [4, 2, 0, 0, 0, 0, 0],
          dimensionUnits: 3,
          fluxType: 1,
        }),
        buildRayBytes([[0, 0, 0, 0, 0, 1, 2]]),
      ),
    );
    expect(await inspectRayFile({ input_path: input })).toEqual({
      ok: true,
      summary: {
        kind: "binary",
        input_path: input,
        identifier: 1010,
        ray_count: 1,
        description: "lamp",
        dimension_units: 3,
        ray_format_type: 0,
        flux_type: 1,
        source_flux: 4,
        ray_set_flux: 2,
      },
    });
  });

  it("summarizes an ASCII file by line shape", async () => {
    const input = tmp.file("lamp.txt");
    writeFileSync(
      input,
      asciiRayText("3 1 0 0", [[0, 0, 0, 0, 0, 1, 1], [0, 0, 0, 0, 0, 1, 1, 0.5]], ["# exported"]),
    );
    const result = await inspectRayFile({ input_path: input });
    expect(result).toMatchObject({
      ok: true,
      summary: { kind: "ascii", header_line_index: 1, declared_ray_count: 3, ray_lines: 1, spectral_lines: 1 },
    });
  });

  it("treats configured extensions as binary", async () => {
    const input = tmp.file("lamp.bin");
    writeFileSync(input, buildHeaderBytes({ identifier: 9999 }));
    const result = await inspectRayFile({ input_path: input }, { config: { binary_extensions: [".bin"] } });
    expect(result).toEqual({ ok: false, code: "UnknownIdentifier", error: "Incorrect file identifier: 9999" });
  });

  it("reports files without a header line", async () => {
    const input = tmp.file("empty.txt");
    writeFileSync(input, "");
    const result = await inspectRayFile({ input_path: input });
    expect(result).toMatchObject({ ok: false, code: "NoHeaderFound" });
  });
});
