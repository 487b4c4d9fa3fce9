import "reflect-metadata";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { GLOBAL_MODULE_METADATA } from "@nestjs/common/constants";
import { Test } from "@nestjs/testing";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RUNTIME_OPTIONS_TOKEN } from "../src/config.const";
import { ConfigModule } from "../src/config.module";
import { ConfigService } from "../src/config.service";

describe("ConfigModule", () => {
  let presetsDir: string;

  beforeEach(async () => {
    presetsDir = await fs.mkdtemp(path.join(os.tmpdir(), "strata-presets-"));
    await fs.writeFile(path.join(presetsDir, "pipeline_config_base.yml"), "a: 1\n");
    await fs.writeFile(path.join(presetsDir, "child.yaml"), "FROM: base\nb: 2\n");
    await fs.writeFile(path.join(presetsDir, "notes.txt"), "not a preset\n");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(presetsDir, { recursive: true, force: true });
  });

  it("is marked as global for Nest consumers", () => {
    expect(Reflect.getMetadata(GLOBAL_MODULE_METADATA, ConfigModule)).toBe(true);
    expect(ConfigModule.register({}).global).toBe(true);
  });

  it("overlays registered options on the environment", async () => {
    vi.stubEnv("STRATA_MAX_DEPTH", "7");
    vi.stubEnv("STRATA_LOG_LEVEL", "error");

    const moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.register({ presetsDir, logLevel: "debug" })],
    }).compile();

    expect(moduleRef.get(RUNTIME_OPTIONS_TOKEN)).toMatchObject({
      presetsDir,
      maxDepth: 7,
      logLevel: "debug",
    });

    await moduleRef.close();
  });

  it("serves the preset catalog from the configured directory", async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.register({ presetsDir })],
    }).compile();
    const service = moduleRef.get(ConfigService);

    expect(service.listPresets()).toEqual(["base", "child"]);
    await expect(service.inspect("child")).resolves.toMatchObject({
      chain: [
        expect.objectContaining({ name: "base", id: "preset:base" }),
        expect.objectContaining({ name: "child", id: "preset:child" }),
      ],
    });

    await moduleRef.close();
  });
});
