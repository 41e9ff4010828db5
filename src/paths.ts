import { homedir } from "node:os";
import { join } from "node:path";

export const RECKLESS_HOME = process.env.RECKLESS_HOME || join(homedir(), ".reckless");
export const REPOS_DIR = join(RECKLESS_HOME, "repositories");
export const CONFIG_FILE = join(RECKLESS_HOME, "config.json");
