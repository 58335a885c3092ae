#!/usr/bin/env tsx
import { config as loadEnv } from "dotenv";

import { runCli } from "./cli.js";

loadEnv();

process.exitCode = await runCli(process.argv.slice(2));
