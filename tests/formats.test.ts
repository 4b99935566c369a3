import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../src/core/errors.js";
import {
  detectArtifactKind,
  normalizeFormats,
  retargetFileName,
  runIdFromFileName,
  targetFileNames
} from "../src/core/formats.js";
import { isBioProjectAccession, isRunAccession } from "../src/core/ids.js";
import { parseMethods } from "../src/download/methods.js";

describe("formats", () => {
  it("normalizes format sets to canonical order without duplicates", () => {
    expect(normalizeFormats(["fasta.gz", "FASTQ", "fastq", " sra "])).toEqual(["sra", "fastq", "fasta.gz"]);
    expect(() => normalizeFormats([])).toThrow(ConfigurationError);
    expect(() => normalizeFormats(["bam"])).toThrow("unknown output format: bam");
  });

  it("derives deterministic target names", () => {
    expect(targetFileNames("SRR000001", "sra")).toEqual(["SRR000001.sra"]);
    expect(targetFileNames("SRR000001", "fastq.gz")).toEqual([
      "SRR000001_1.fastq.gz",
      "SRR000001_2.fastq.gz",
      "SRR000001.fastq.gz"
    ]);
  });

  it("detects local artifact kinds by extension", () => {
    expect(detectArtifactKind("/data/SRR000001.sra")).toBe("sra");
    expect(detectArtifactKind("SRR000001_1.fq.gz")).toBe("fastq.gz");
    expect(detectArtifactKind("reads.fa")).toBe("fasta");
    expect(detectArtifactKind("reads.fna.gz")).toBe("fasta.gz");
    expect(detectArtifactKind("reads.bam")).toBeNull();
  });

  it("keeps the mate suffix when renaming across formats", () => {
    expect(runIdFromFileName("/in/SRR000001_2.fq.gz")).toBe("SRR000001");
    expect(retargetFileName("SRR000001", "/in/SRR000001_2.fq.gz", "fasta")).toBe("SRR000001_2.fasta");
    expect(retargetFileName("SRR000001", "SRR000001.fastq.gz", "fastq")).toBe("SRR000001.fastq");
  });
});

describe("ids and methods", () => {
  it("validates accessions", () => {
    expect(isRunAccession("SRR1234567")).toBe(true);
    expect(isRunAccession("ERR000001")).toBe(true);
    expect(isRunAccession("SRX1234567")).toBe(false);
    expect(isBioProjectAccession("PRJNA123456")).toBe(true);
    expect(isBioProjectAccession("PRJXA1")).toBe(false);
  });

  it("keeps method order and repeats", () => {
    expect(parseMethods(["aws-http", "ena-ftp", "aws-http"])).toEqual(["aws-http", "ena-ftp", "aws-http"]);
    expect(() => parseMethods(["ftp"])).toThrow("unknown download method: ftp");
    expect(() => parseMethods([])).toThrow(ConfigurationError);
  });
});
