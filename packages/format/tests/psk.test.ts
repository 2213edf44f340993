/**
 * Skeletal mesh codec tests
 */

import { describe, it, expect, beforeAll } from "vitest";
import { Logger } from "@actorx/shared";
import {
  BONE_LAYOUT,
  FACE16_LAYOUT,
  FACE32_LAYOUT,
  MATERIAL_LAYOUT,
  WEDGE16_LAYOUT,
  createMaterial,
  createPskDocument,
  readChunks,
  readPsk,
  writeChunk,
  writeMarkerChunk,
  writePsk,
  type Face,
  type Wedge,
} from "../src/index.js";
import { POINT_LAYOUT, WEIGHT_LAYOUT } from "../src/records.js";
import { createTriangleMesh, expectFormatError } from "./helpers.js";

beforeAll(() => {
  Logger.setLevel("silent");
});

describe("PSK round trip", () => {
  it("reads back exactly what was written", () => {
    const doc = createTriangleMesh();
    expect(readPsk(writePsk(doc))).toEqual(doc);
  });

  it("keeps optional chunks", () => {
    const doc = createTriangleMesh();
    doc.extraUvs = [
      [
        [0.5, 0.5],
        [0.25, 0.75],
        [1, 1],
      ],
    ];
    doc.vertexColors = [
      [255, 0, 0, 255],
      [0, 255, 0, 255],
      [0, 0, 255, 128],
    ];
    doc.vertexNormals = [
      [0, 0, 1],
      [0, 0, 1],
      [0, 0, 1],
    ];
    doc.morphInfos = [{ name: "Smile", vertexCount: 1 }];
    doc.morphData = [
      { positionDelta: [0, 0.5, 0], tangentZDelta: [0, 0, 0], pointIndex: 2 },
    ];

    expect(readPsk(writePsk(doc))).toEqual(doc);
  });

  it("writes chunks in format order", () => {
    const doc = createTriangleMesh();
    doc.extraUvs = [[[0, 0], [0, 0], [0, 0]]];
    doc.vertexNormals = [
      [0, 0, 1],
      [0, 0, 1],
      [0, 0, 1],
    ];

    const ids = readChunks(writePsk(doc)).map((chunk) => chunk.id);

    expect(ids).toEqual([
      "ACTRHEAD",
      "PNTS0000",
      "VTXW0000",
      "FACE0000",
      "MATT0000",
      "REFSKELT",
      "RAWWEIGHTS",
      "EXTRAUVS0",
      "VTXNORMS",
    ]);
  });

  it("leaves out empty UV channels without renumbering later ones", () => {
    const doc = createTriangleMesh();
    doc.extraUvs = [
      [],
      [
        [0.5, 0.5],
        [0.25, 0.75],
        [1, 1],
      ],
    ];

    const bytes = writePsk(doc);
    const ids = readChunks(bytes).map((chunk) => chunk.id);

    expect(ids.slice(7)).toEqual(["EXTRAUVS1"]);
    expect(readPsk(bytes)).toEqual(doc);
  });

  it("pads material names with NUL bytes", () => {
    const doc = createTriangleMesh();
    const materials = readChunks(writePsk(doc)).find(
      (chunk) => chunk.id === "MATT0000",
    );

    expect(materials?.recordSize).toBe(88);
    expect(materials?.data.subarray(0, 4).toString("latin1")).toBe("Skin");
    expect(Array.from(materials?.data.subarray(4, 64) ?? [])).toEqual(
      new Array(60).fill(0),
    );
  });

  it("preserves Windows-1252 names byte for byte", () => {
    const doc = createTriangleMesh();
    doc.materials = [createMaterial("Métal™")];

    const materials = readChunks(writePsk(doc)).find(
      (chunk) => chunk.id === "MATT0000",
    );

    expect(Array.from(materials?.data.subarray(0, 7) ?? [])).toEqual([
      0x4d, 0xe9, 0x74, 0x61, 0x6c, 0x99, 0x00,
    ]);
    expect(readPsk(writePsk(doc)).materials[0].name).toBe("Métal™");
  });
});

describe("Wedge and face widths", () => {
  const faces: Face[] = [
    {
      wedgeIndices: [0, 1, 2],
      materialIndex: 1,
      auxMaterialIndex: 0,
      smoothingGroups: -2,
    },
  ];

  function meshBytes(faceChunk: Buffer): Buffer {
    return Buffer.concat([
      writeMarkerChunk("ACTRHEAD"),
      writeChunk("PNTS0000", POINT_LAYOUT, [
        [0, 0, 0],
        [1, 0, 0],
        [0, 1, 0],
      ]),
      writeChunk<Wedge>("VTXW0000", WEDGE16_LAYOUT, [
        { pointIndex: 0, u: 0, v: 0, materialIndex: 1 },
        { pointIndex: 1, u: 1, v: 0, materialIndex: 1 },
        { pointIndex: 2, u: 0, v: 1, materialIndex: 1 },
      ]),
      faceChunk,
      writeChunk("MATT0000", MATERIAL_LAYOUT, [
        createMaterial("A"),
        createMaterial("B"),
      ]),
      writeChunk("REFSKELT", BONE_LAYOUT, []),
      writeChunk("RAWWEIGHTS", WEIGHT_LAYOUT, []),
    ]);
  }

  it("decodes 16-bit and 32-bit faces to the same records", () => {
    const narrow = readPsk(meshBytes(writeChunk("FACE0000", FACE16_LAYOUT, faces)));
    const wide = readPsk(meshBytes(writeChunk("FACE3200", FACE32_LAYOUT, faces)));

    expect(narrow.faces).toEqual(faces);
    expect(wide.faces).toEqual(faces);
    expect(wide).toEqual(narrow);
  });

  it("selects the face layout by record size, not by tag", () => {
    const mislabelled = readPsk(
      meshBytes(writeChunk("FACE0000", FACE32_LAYOUT, faces)),
    );
    expect(mislabelled.faces).toEqual(faces);
  });

  it("rejects face records of any other size", () => {
    const odd = Buffer.concat([
      writeChunk("FACE0000", FACE16_LAYOUT, faces),
      Buffer.alloc(2),
    ]);
    // Declare 14-byte records over the 14 bytes that follow the header
    odd.writeInt32LE(14, 24);
    expectFormatError(() => readPsk(meshBytes(odd)), "record-size");
  });

  it("switches to 32-bit records above 65536 wedges", () => {
    const doc = createPskDocument();
    doc.points = [[0, 0, 0]];
    doc.wedges = Array.from({ length: 65537 }, () => ({
      pointIndex: 0,
      u: 0,
      v: 0,
      materialIndex: 300,
    }));
    doc.faces = [
      {
        wedgeIndices: [0, 65535, 65536],
        materialIndex: 0,
        auxMaterialIndex: 0,
        smoothingGroups: 0,
      },
    ];
    doc.materials = [createMaterial("Only")];

    const bytes = writePsk(doc);
    const ids = readChunks(bytes).map((chunk) => chunk.id);

    expect(ids).toContain("FACE3200");
    expect(readPsk(bytes)).toEqual(doc);
  });

  it("refuses a material index the 16-bit wedge cannot hold", () => {
    const doc = createTriangleMesh();
    doc.wedges[0].materialIndex = 256;
    expectFormatError(() => writePsk(doc), "field-overflow");
  });
});

describe("PSK errors", () => {
  it("rejects a file missing required chunks", () => {
    const bytes = Buffer.concat([
      writeMarkerChunk("ACTRHEAD"),
      writeChunk("PNTS0000", POINT_LAYOUT, [[0, 0, 0]]),
    ]);
    const error = expectFormatError(() => readPsk(bytes), "missing-chunk");
    expect(error.message).toContain("VTXW0000");
  });

  it("rejects required chunks out of order", () => {
    const bytes = Buffer.concat([
      writeMarkerChunk("ACTRHEAD"),
      writeChunk<Wedge>("VTXW0000", WEDGE16_LAYOUT, []),
    ]);
    const error = expectFormatError(() => readPsk(bytes), "missing-chunk");
    expect(error.chunkId).toBe("VTXW0000");
  });

  it("rejects an optional chunk inside the required block", () => {
    const bytes = Buffer.concat([
      writeMarkerChunk("ACTRHEAD"),
      writeChunk("PNTS0000", POINT_LAYOUT, [[0, 0, 0]]),
      writeChunk<Wedge>("VTXW0000", WEDGE16_LAYOUT, []),
      writeChunk("FACE0000", FACE16_LAYOUT, []),
      writeChunk("MATT0000", MATERIAL_LAYOUT, []),
      writeChunk("REFSKELT", BONE_LAYOUT, []),
      writeChunk("VTXNORMS", POINT_LAYOUT, [[0, 0, 1]]),
      writeChunk("RAWWEIGHTS", WEIGHT_LAYOUT, []),
    ]);
    const error = expectFormatError(() => readPsk(bytes), "missing-chunk");
    expect(error.chunkId).toBe("VTXNORMS");
    expect(error.message).toBe("VTXNORMS: psk: expected RAWWEIGHTS, found VTXNORMS");
  });

  it("skips unknown chunks", () => {
    const doc = createTriangleMesh();
    const bytes = Buffer.concat([
      writePsk(doc),
      writeChunk("SOMETHINGNEW", POINT_LAYOUT, [[9, 9, 9]]),
    ]);
    expect(readPsk(bytes)).toEqual(doc);
  });

  it("rejects a wedge that points past the point list", () => {
    const doc = createTriangleMesh();
    doc.wedges[2].pointIndex = 3;
    const error = expectFormatError(() => writePsk(doc), "index-range");
    expect(error.chunkId).toBe("VTXW0000");
  });

  it("rejects a face that points past the wedge list", () => {
    const doc = createTriangleMesh();
    doc.faces[0].wedgeIndices = [0, 1, 3];
    expectFormatError(() => writePsk(doc), "index-range");
  });

  it("rejects a weight on a missing bone", () => {
    const doc = createTriangleMesh();
    doc.weights.push({ weight: 1, pointIndex: 0, boneIndex: 2 });
    expectFormatError(() => writePsk(doc), "index-range");
  });

  it("rejects a truncated file", () => {
    const bytes = writePsk(createTriangleMesh());
    expectFormatError(
      () => readPsk(bytes.subarray(0, bytes.length - 4)),
      "payload-overflow",
    );
  });
});
