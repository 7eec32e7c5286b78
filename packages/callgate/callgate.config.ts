import type { CallgateConfig } from "./src/config/types.js";

const config: CallgateConfig = {
  policy: { path: "tool_policy.json" },
  engine: {
    maxEntries: 1000,
    alignment: { minTokenLength: 4, minOverlap: 1 },
    indeterminate: { duplicate: "conservative", alignment: "permissive" },
  },
  plugins: [
    {
      type: "storage",
      name: "sqlite",
      config: { database: "callgate.sqlite" },
    },
    {
      type: "eventSink",
      name: "sqlite",
    },
    {
      type: "eventSink",
      name: "log",
    },
  ],
};

export default config;
