/**
 * @chartwise/release-engine — Extension Entry Point
 */

import type { Command } from "commander";
import { createReleaseCli } from "./src/cli.js";

export * from "./src/index.js";

export default {
  id: "release-engine",
  name: "Release Engine",
  commands: ["release"],
  register(program: Command) {
    createReleaseCli()({ program });
  },
};
