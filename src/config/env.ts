import { config as loadEnv } from "dotenv";

export type ExtractorEnv = {
  configPath: string;
  outDir: string;
};

export const DEFAULT_CONFIG_PATH = "data/config.json";
export const DEFAULT_OUT_DIR = "data/out/tables";

let loaded = false;

export function loadExtractorEnv(): ExtractorEnv {
  if (!loaded) {
    loadEnv({ path: ".env.local" });
    loaded = true;
  }
  return {
    configPath: process.env.EXTRACTOR_CONFIG_PATH?.trim() || DEFAULT_CONFIG_PATH,
    outDir: process.env.EXTRACTOR_OUT_DIR?.trim() || DEFAULT_OUT_DIR,
  };
}
