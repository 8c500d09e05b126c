// eslint.config.mts
import eslint from "@eslint/js"
import globals from "globals"
import tseslint from "typescript-eslint"

export default tseslint.config(
  eslint.configs.recommended,
  tseslint.configs.strictTypeChecked,
  {
    name: "analyzers",
    languageOptions: {
      globals: { ...globals.node },
      parserOptions: {
        projectService: true,
        tsconfigRootDir: import.meta.dirname
      }
    },
    files: ["**/*.ts"],
    rules: {
      complexity: ["error", 8],
      "max-params": ["error", 5],
      "max-depth": ["error", 4],
      "no-restricted-imports": ["error", {
        paths: [
          { name: "ts-pattern", message: "Use Effect.Match instead of ts-pattern." },
          { name: "zod", message: "Use @effect/schema for schemas and validation." }
        ]
      }],
      "no-restricted-syntax": [
        "error",
        {
          selector: "TSUnknownKeyword",
          message: "Avoid 'unknown': narrow the type at its source."
        },
        {
          selector: "TryStatement",
          message: "Use Effect.try / catchAll instead of try/catch in core/app."
        },
        {
          selector: "SwitchStatement",
          message: "Use Effect Match instead of switch statements."
        },
        {
          selector: "FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
          message: "Use Effect.gen / Effect.tryPromise instead of async/await."
        }
      ],
      "@typescript-eslint/array-type": ["warn", { default: "generic", readonly: "generic" }],
      "@typescript-eslint/consistent-type-imports": "warn",
      "@typescript-eslint/restrict-template-expressions": ["error", { allowNumber: true, allowBoolean: true }],
      "@typescript-eslint/no-unused-vars": ["error", { argsIgnorePattern: "^_", varsIgnorePattern: "^_" }]
    }
  },
  {
    files: ["**/*.{js,cjs,mjs}"],
    extends: [tseslint.configs.disableTypeChecked]
  },
  { ignores: ["dist/**", "coverage/**", "eslint.config.mts"] }
)
