import eslint from "@eslint/js";
import { readFileSync } from "node:fs";
import { basename, join } from "node:path";
import tseslint from "typescript-eslint";
import type { Rule } from "eslint";
import type { ConfigArray } from "typescript-eslint";

// node --test on Node 20 neither expands globs nor finds .ts files, so the
// test script names every test file
function listedTestFiles(): string[] {
	const manifest: unknown = JSON.parse(
		readFileSync(join(import.meta.dirname, "package.json"), "utf8"),
	);
	if (
		typeof manifest !== "object" ||
		manifest === null ||
		!("scripts" in manifest) ||
		typeof manifest.scripts !== "object" ||
		manifest.scripts === null ||
		!("test" in manifest.scripts) ||
		typeof manifest.scripts.test !== "string"
	) {
		return [];
	}
	return manifest.scripts.test
		.split(/\s+/)
		.filter((word) => word.endsWith(".test.ts"))
		.map((word) => basename(word));
}

const testFileRule: Rule.RuleModule = {
	meta: {
		type: "problem",
		docs: {
			description:
				"Require test files to be *.unit.test.ts or *.integration.test.ts and listed in the test script",
		},
		messages: {
			badSuffix:
				"Test file must end with .unit.test.ts or .integration.test.ts. Found: '{{actual}}'",
			notListed:
				"'{{actual}}' is not named in the test script of package.json and will never run",
		},
	},
	create(context) {
		const name = basename(context.filename);

		return {
			Program() {
				if (!name.endsWith(".unit.test.ts") && !name.endsWith(".integration.test.ts")) {
					context.report({
						loc: { column: 0, line: 1 },
						messageId: "badSuffix",
						data: { actual: name },
					});
					return;
				}
				if (!listedTestFiles().includes(name)) {
					context.report({
						loc: { column: 0, line: 1 },
						messageId: "notListed",
						data: { actual: name },
					});
				}
			},
		};
	},
};

export default [
	{
		ignores: ["dist/**", "node_modules/**", "eslint.config.ts"],
	},

	{
		files: ["test/**/*.test.ts"],
		plugins: {
			interleave: { rules: { "test-file": testFileRule } },
		},
		rules: {
			"interleave/test-file": "error",
		},
	},

	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// Type-aware rules for the library; floating yields are the usual mistake
	...tseslint.configs.strictTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	{
		files: ["src/**/*.ts"],
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{ allowNumber: true },
			],
		},
	},

	...tseslint.configs.recommended.map((config) => ({
		...config,
		files: ["test/**/*.ts"],
	})),

	{
		files: ["**/*.ts"],
		rules: {
			indent: ["error", "tab"],
			quotes: ["error", "double", { avoidEscape: true }],
		},
	},
] satisfies ConfigArray;
