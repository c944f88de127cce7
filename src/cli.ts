#!/usr/bin/env node
/**
 * cloud-billing entry point.
 */

import { Command } from "commander";
import { createConsoleLogger } from "./logger.js";
import { registerBillingCli } from "./register-cli.js";
import { VERSION } from "./version.js";

const program = new Command()
  .name("cloud-billing")
  .description("Retrieve billing data from Alibaba Cloud, Azure, AWS, Huawei Cloud and Kubecost")
  .version(VERSION)
  .option("--verbose", "Log debug output to stderr");

registerBillingCli({
  program,
  logger: createConsoleLogger({ verbose: process.argv.includes("--verbose") }),
});

await program.parseAsync(process.argv);
