import { includeIgnoreFile } from "@eslint/compat";
import arityConfig from "@arity/eslint-config";
import path from "node:path";

import type { TSESLint } from "@typescript-eslint/utils";

const gitignorePath = path.resolve(import.meta.dirname, "../../.gitignore");

const configs: TSESLint.FlatConfig.ConfigArray = [
  includeIgnoreFile(gitignorePath),
  ...arityConfig,
  {
    languageOptions: {
      parserOptions: {
        projectService: {
          allowDefaultProject: ["eslint.config.mts", "vitest.config.mts"],
        },
        tsconfigRootDir: import.meta.dirname,
      },
    },
  },
];

export default configs;
