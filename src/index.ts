#!/usr/bin/env node
import { run } from "./cli.js";
import { errorMessage } from "./scrapers/utils.js";

run(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Scraper failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
