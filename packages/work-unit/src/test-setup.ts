// Test setup for the work-unit package
// This file is run before each test file

import { configure } from "@logtape/logtape"

// Silent by default; tests that assert on log records reconfigure with reset
await configure({
  sinks: {},
  loggers: [
    {
      category: ["@publish-flow"],
      lowestLevel: "fatal",
      sinks: [],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "fatal",
      sinks: [],
    },
  ],
})
