#!/usr/bin/env node

import fs from "node:fs";
import process from "node:process";
import { describeError, isAnalysisError, loadInsightxConfig } from "@insightx/core";
import { createAnalysisSession } from "@insightx/runtime";
import { parseCliArgs, readExpertise, readLanguage, readString, readStyle } from "./cliArgs";
import { USAGE, describeConfig, runCommand, type CliIo } from "./commands";

const io: CliIo = {
	out: (line) => console.log(line),
	readText: (filePath) => fs.readFileSync(filePath, "utf8"),
	writeFile: (filePath, data) => fs.writeFileSync(filePath, data),
};

const main = async (): Promise<void> => {
	const parsed = parseCliArgs(process.argv.slice(2));
	if (parsed.args.help || !parsed.command) {
		console.log(USAGE);
		return;
	}

	const config = loadInsightxConfig({
		envPath: readString(parsed.args, "envPath"),
		configDir: readString(parsed.args, "configDir"),
		analysisProfile: readString(parsed.args, "profile"),
	});
	if (parsed.command === "config") {
		io.out(describeConfig(config));
		return;
	}

	const language = readLanguage(parsed.args);
	const expertise = readExpertise(parsed.args);
	const style = readStyle(parsed.args);
	const session = createAnalysisSession({
		config,
		preferences: {
			...(language ? { language } : {}),
			...(expertise ? { expertise } : {}),
			...(style ? { style } : {}),
		},
	});

	await runCommand(session, parsed, io, { ticker: config.env.defaultTicker });
};

main().catch((error: unknown) => {
	if (isAnalysisError(error)) {
		console.error(`${error.code}: ${error.message}`);
	} else {
		console.error(`Analysis failed: ${describeError(error)}`);
	}
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
