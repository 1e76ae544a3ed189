#!/usr/bin/env tsx
import { main } from "./cli";
import { config } from "./config";
import { setLogLevel } from "./logging";

setLogLevel(config.logging.level);
process.exitCode = await main(process.argv.slice(2));
