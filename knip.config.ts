import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/pagewise": {
      entry: ["src/index.ts", "src/backend/sqlite/index.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts"],
    },
  },
};

export default config;
