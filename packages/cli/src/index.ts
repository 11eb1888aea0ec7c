#!/usr/bin/env node
import { basicLogger, createNodeServer } from "@poolhttp/engine";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2), {
  print: (text) => console.log(text),
  printError: (text) => console.error(text),
  logger: basicLogger(),
  createServer: (config, logger) => createNodeServer({ config, logger }),
  onSignal: (signal, handler) => {
    process.on(signal, handler);
  },
  exit: (code) => process.exit(code),
})
  .then((outcome) => {
    if (outcome.kind === "exited") {
      process.exitCode = outcome.code;
    }
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
