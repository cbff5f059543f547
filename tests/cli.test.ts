import { afterAll, afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import chalk from "chalk";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "node:url";
import sharp from "sharp";
import { main } from "../src/program.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const OUTPUT = path.join(__dirname, "cli-test-output");
const DEFAULT_ICONS = path.join(OUTPUT, "static", "icons");
const CONFIG_PATH = path.join(OUTPUT, "repolizer.config.json");

async function createSource(iconsDir: string) {
  fs.mkdirSync(iconsDir, { recursive: true });
  await sharp({
    create: { width: 512, height: 512, channels: 3, background: { r: 40, g: 80, b: 120 } },
  })
    .png()
    .toFile(path.join(iconsDir, "icon-512x512.png"));
}

function run(...args: string[]): Promise<number> {
  return main(["node", "generate-pwa-icons", ...args], OUTPUT);
}

let log: MockInstance<typeof console.log>;
let error: MockInstance<typeof console.error>;

beforeEach(() => {
  fs.rmSync(OUTPUT, { recursive: true, force: true });
  fs.mkdirSync(OUTPUT, { recursive: true });
  log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  error = vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

afterAll(() => {
  fs.rmSync(OUTPUT, { recursive: true, force: true });
});

describe("generate-pwa-icons", () => {
  it("exits with 1 and explains when the source icon is missing", async () => {
    const exitCode = await run();

    expect(exitCode).toBe(1);
    expect(log.mock.calls).toEqual([
      [`Source icon not found at ${path.join(DEFAULT_ICONS, "icon-512x512.png")}`],
      ["Please place a 512x512 PNG icon at this location and try again."],
    ]);
    expect(fs.readdirSync(DEFAULT_ICONS)).toEqual([]);
  });

  it("exits with 0 after generating into static/icons", async () => {
    await createSource(DEFAULT_ICONS);

    const exitCode = await run();

    expect(exitCode).toBe(0);
    expect(fs.readdirSync(DEFAULT_ICONS)).toHaveLength(13);
    expect(log).toHaveBeenLastCalledWith("PWA icon generation complete!");
  });

  it("uses --dir instead of the default directory", async () => {
    const customDir = path.join(OUTPUT, "assets");
    await createSource(customDir);

    const exitCode = await run("--dir", "assets");

    expect(exitCode).toBe(0);
    expect(fs.readdirSync(customDir)).toHaveLength(13);
    expect(fs.existsSync(DEFAULT_ICONS)).toBe(false);
  });

  it("prefers --dir over iconsDir from config", async () => {
    fs.writeFileSync(CONFIG_PATH, JSON.stringify({ iconsDir: "from-config" }));
    const flagDir = path.join(OUTPUT, "from-flag");
    await createSource(flagDir);

    const exitCode = await run("--dir", "from-flag");

    expect(exitCode).toBe(0);
    expect(fs.readdirSync(flagDir)).toHaveLength(13);
    expect(fs.existsSync(path.join(OUTPUT, "from-config"))).toBe(false);
  });

  it("reads iconsDir from config when no flag is given", async () => {
    fs.writeFileSync(CONFIG_PATH, JSON.stringify({ iconsDir: "from-config" }));
    const configDir = path.join(OUTPUT, "from-config");
    await createSource(configDir);

    const exitCode = await run();

    expect(exitCode).toBe(0);
    expect(fs.readdirSync(configDir)).toHaveLength(13);
  });

  it("applies quiet from config when the flag is absent", async () => {
    fs.writeFileSync(CONFIG_PATH, JSON.stringify({ quiet: true }));
    await createSource(DEFAULT_ICONS);

    const exitCode = await run();

    expect(exitCode).toBe(0);
    expect(log).not.toHaveBeenCalled();
    expect(fs.readdirSync(DEFAULT_ICONS)).toHaveLength(13);
  });

  it("keeps the missing-source message under --quiet", async () => {
    const exitCode = await run("--quiet");

    expect(exitCode).toBe(1);
    expect(log).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenLastCalledWith(
      "Please place a 512x512 PNG icon at this location and try again."
    );
  });

  it("exits with 1 and prints the config error in red", async () => {
    fs.writeFileSync(CONFIG_PATH, JSON.stringify({ bogus: 1 }));

    const exitCode = await run();

    expect(exitCode).toBe(1);
    expect(error.mock.calls).toEqual([
      [chalk.red(`Unknown config key "bogus" in ${CONFIG_PATH}.`)],
    ]);
    expect(fs.existsSync(DEFAULT_ICONS)).toBe(false);
  });

  it("exits with 1 when an explicit config file is missing", async () => {
    const exitCode = await run("--config", "nope.json");

    expect(exitCode).toBe(1);
    expect(error.mock.calls).toEqual([
      [chalk.red(`Config file not found: ${path.join(OUTPUT, "nope.json")}`)],
    ]);
  });
});
