#!/usr/bin/env tsx
import { runCli } from "./cli";

const controller = new AbortController();

process.once("SIGINT", () => {
  console.error("\n⏹️  Cancelling build...");
  controller.abort();
});

runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
  signal: controller.signal,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("❌ slidesmith crashed:", error);
    process.exitCode = 1;
  });
