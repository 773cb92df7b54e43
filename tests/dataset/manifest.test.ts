/**
 * Tests for the dataset manifest
 */

import { describe, it, expect, beforeAll, afterAll } from "@jest/globals";
import fs from "node:fs/promises";
import path from "node:path";
import {
  loadManifest,
  parseManifest,
  resolveManifestPath,
  resolveSplitFiles,
  selectConfig,
} from "../../src/dataset/manifest.js";
import { ConfigError, ErrorCode, FileSystemError, UsageError, isUsageError } from "../../src/utils/errors.js";
import { makeTempDir, writeJsonl } from "../fixtures/documents.js";

const MANIFEST = `
name: gene_corpus
display_name: Gene Corpus
tasks: [NER, relation_extraction]
configs:
  - name: gene_corpus_kb
    schema: kb
    splits:
      train: data/train.jsonl
      test: data/test-*.jsonl
  - name: gene_corpus_text
    schema: TEXT
    splits:
      train: [data/train.jsonl]
bypass:
  keys: [normalized]
  split_keys: ["test:relations"]
`;

describe("parseManifest", () => {
  it("should parse a complete manifest", () => {
    const manifest = parseManifest(MANIFEST, "/data/gene_corpus/dataset.yaml");

    expect(manifest.name).toBe("gene_corpus");
    expect(manifest.displayName).toBe("Gene Corpus");
    expect(manifest.tasks).toEqual(["named_entity_recognition", "relation_extraction"]);
    expect(manifest.configs.map((c) => [c.name, c.schema])).toEqual([
      ["gene_corpus_kb", "KB"],
      ["gene_corpus_text", "TEXT"],
    ]);
    expect(manifest.bypass).toEqual({
      splits: [],
      keys: ["normalized"],
      splitKeys: [{ split: "test", key: "relations" }],
    });
    expect(manifest.rootDir).toBe("/data/gene_corpus");
  });

  it("should default the bypass section", () => {
    const manifest = parseManifest(
      "name: x\ntasks: [NER]\nconfigs:\n  - name: x_kb\n    schema: KB\n    splits: {train: a.jsonl}\n",
      "/m.yaml"
    );
    expect(manifest.bypass).toEqual({ splits: [], keys: [], splitKeys: [] });
  });

  it("should reject invalid YAML", () => {
    expect(() => parseManifest("name: [unclosed", "/m.yaml")).toThrow(ConfigError);
    try {
      parseManifest("name: [unclosed", "/m.yaml");
    } catch (error) {
      expect(error instanceof ConfigError && error.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
    }
  });

  it("should reject a manifest without configs", () => {
    expect(() => parseManifest("name: x\ntasks: [NER]\nconfigs: []\n", "/m.yaml")).toThrow(
      "Invalid manifest /m.yaml: configs: configs must list at least one config"
    );
  });

  it("should reject unknown schemas", () => {
    const content = "name: x\ntasks: [NER]\nconfigs:\n  - name: x_bioc\n    schema: bioc\n    splits: {train: a.jsonl}\n";
    expect(() => parseManifest(content, "/m.yaml")).toThrow(ConfigError);
  });

  it("should reject duplicate config names", () => {
    const content =
      "name: x\ntasks: [NER]\nconfigs:\n" +
      "  - {name: a, schema: KB, splits: {train: a.jsonl}}\n" +
      "  - {name: a, schema: KB, splits: {train: b.jsonl}}\n";
    expect(() => parseManifest(content, "/m.yaml")).toThrow('Config "a" is defined twice in /m.yaml');
  });

  it("should reject unknown tasks as a usage error", () => {
    const content = "name: x\ntasks: [NER, sentiment]\nconfigs:\n  - {name: a, schema: KB, splits: {train: a.jsonl}}\n";

    expect(() => parseManifest(content, "/m.yaml")).toThrow(UsageError);
  });
});

describe("selectConfig", () => {
  const manifest = parseManifest(MANIFEST, "/data/gene_corpus/dataset.yaml");

  it("should find a config by name", () => {
    expect(selectConfig(manifest, "gene_corpus_text").schema).toBe("TEXT");
  });

  it("should list the available configs for an unknown name", () => {
    expect(() => selectConfig(manifest, "gene_corpus_bigbio")).toThrow(
      'Unknown config "gene_corpus_bigbio". Available configs: gene_corpus_kb, gene_corpus_text'
    );
    try {
      selectConfig(manifest, "other");
    } catch (error) {
      expect(isUsageError(error)).toBe(true);
    }
  });
});

describe("manifest files", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir();
    await fs.writeFile(path.join(tempDir, "dataset.yaml"), MANIFEST, "utf-8");
    await writeJsonl(path.join(tempDir, "data", "train.jsonl"), [{ id: "d0" }]);
    await writeJsonl(path.join(tempDir, "data", "test-b.jsonl"), [{ id: "d2" }]);
    await writeJsonl(path.join(tempDir, "data", "test-a.jsonl"), [{ id: "d1" }]);
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should find the manifest in a dataset directory", async () => {
    expect(await resolveManifestPath(tempDir)).toBe(path.join(tempDir, "dataset.yaml"));
  });

  it("should accept the manifest file itself", async () => {
    const manifestPath = path.join(tempDir, "dataset.yaml");
    expect(await resolveManifestPath(manifestPath)).toBe(manifestPath);
  });

  it("should fail when there is no manifest", async () => {
    await expect(resolveManifestPath(path.join(tempDir, "data"))).rejects.toMatchObject({
      code: ErrorCode.CONFIG_NOT_FOUND,
    });
    await expect(resolveManifestPath(path.join(tempDir, "nowhere"))).rejects.toBeInstanceOf(ConfigError);
  });

  it("should load the manifest with its root directory", async () => {
    const manifest = await loadManifest(tempDir);

    expect(manifest.manifestPath).toBe(path.join(tempDir, "dataset.yaml"));
    expect(manifest.rootDir).toBe(tempDir);
  });

  it("should expand split patterns into sorted files", async () => {
    const manifest = await loadManifest(tempDir);
    const splitFiles = await resolveSplitFiles(selectConfig(manifest, "gene_corpus_kb"), manifest.rootDir);

    expect([...splitFiles.keys()]).toEqual(["train", "test"]);
    expect(splitFiles.get("train")).toEqual([path.join(tempDir, "data", "train.jsonl")]);
    expect(splitFiles.get("test")).toEqual([
      path.join(tempDir, "data", "test-a.jsonl"),
      path.join(tempDir, "data", "test-b.jsonl"),
    ]);
  });

  it("should not expand skipped splits", async () => {
    const manifest = await loadManifest(tempDir);
    const config = { ...selectConfig(manifest, "gene_corpus_kb"), splits: { train: "data/train.jsonl", dev: "data/dev-*.jsonl" } };

    const splitFiles = await resolveSplitFiles(config, manifest.rootDir, (split) => split === "dev");
    expect(splitFiles.get("dev")).toEqual([]);
  });

  it("should fail on a split that matches no file", async () => {
    const manifest = await loadManifest(tempDir);
    const config = { ...selectConfig(manifest, "gene_corpus_kb"), splits: { dev: "data/dev-*.jsonl" } };

    await expect(resolveSplitFiles(config, manifest.rootDir)).rejects.toMatchObject({
      code: ErrorCode.FS_NO_MATCHING_FILES,
    });
  });

  it("should fail on a missing data directory", async () => {
    const manifest = await loadManifest(tempDir);

    await expect(
      resolveSplitFiles(selectConfig(manifest, "gene_corpus_kb"), path.join(tempDir, "elsewhere"))
    ).rejects.toBeInstanceOf(FileSystemError);
  });
});
