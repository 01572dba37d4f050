import { Command } from "commander";

import releaseEngine from "../../../extensions/release-engine/index.js";
import { VERSION } from "../../version.js";

const EXTENSIONS = [releaseEngine];

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("chartwise")
    .description("Lifecycle hooks and dependency-ordered subchart installation for Kubernetes releases")
    .version(VERSION);

  for (const extension of EXTENSIONS) {
    extension.register(program);
  }
  return program;
}
