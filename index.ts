#!/usr/bin/env node
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { main, runCli } from "./src/index.js";

export { main, runCli };

// Run when executed directly, including through the npm bin symlink.
const invokedPath = process.argv[1];
if (invokedPath && fs.realpathSync(invokedPath) === fileURLToPath(import.meta.url)) {
  void main(process.argv);
}
