#!/usr/bin/env -S tsx

import { runFrameScenarioCli } from "../tools/frame-scenario-runner";

runFrameScenarioCli(process.argv.slice(2)).catch((err) => {
  console.error(err);
  process.exit(1);
});
