#!/usr/bin/env -S node --import tsx

import Pastel from "pastel";
import { loggingEnv } from "./utils/logging-flags.js";

// Set CLI mode and the logging flags before Pastel loads the commands, which
// is when the core package configures its loggers
process.env["CLI_MODE"] = "true";
Object.assign(process.env, loggingEnv(process.argv.slice(2)));

const app = new Pastel({
	importMeta: import.meta,
	name: "taxindex",
	version: "0.1.0",
	description: "Hierarchical index and subtree queries over the NCBI Taxonomy",
});

await app.run();
