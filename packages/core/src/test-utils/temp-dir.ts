// pattern: Imperative Shell

import { stringify as stringifyToml, type JsonMap } from "@iarna/toml";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { stringify as stringifyYaml } from "yaml";

export type SettingsFormat = "json" | "yaml" | "toml";

export interface TempDir {
  path: string;
  /** Absolute path of `name` inside the directory */
  file: (name: string) => string;
  writeFile: (name: string, content: string) => Promise<string>;
  readFile: (name: string) => Promise<string>;
  /** Write `settings` as pipeline.<format> and return its path */
  writeSettings: (settings: JsonMap, format: SettingsFormat) => Promise<string>;
  cleanup: () => Promise<void>;
}

/**
 * Creates a temporary directory for file-based tests
 */
export async function createTempDir(prefix = "pipewright-test-"): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  const file = (name: string): string => join(path, name);

  return {
    path,
    file,
    writeFile: async (name, content) => {
      await writeFile(file(name), content, "utf8");
      return file(name);
    },
    readFile: async name => readFile(file(name), "utf8"),
    writeSettings: async (settings, format) => {
      let content: string;
      switch (format) {
        case "json":
          content = JSON.stringify(settings, null, 2);
          break;
        case "yaml":
          content = stringifyYaml(settings);
          break;
        case "toml":
          content = stringifyToml(settings);
          break;
      }
      const target = file(`pipeline.${format}`);
      await writeFile(target, content, "utf8");
      return target;
    },
    cleanup: async () => {
      await rm(path, { recursive: true, force: true });
    },
  };
}
