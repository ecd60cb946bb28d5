import { describe, expect, it } from "vitest";
import { parseCliArgs, readExpertise, readFlag, readPeriod, requireString } from "./cliArgs";

describe("analysis CLI arg parsing", () => {
	it("captures the command and --ticker with space", () => {
		const { command, args } = parseCliArgs(["stock", "--ticker", "AAPL", "--period", "6mo"]);
		expect(command).toBe("stock");
		expect(args.ticker).toBe("AAPL");
		expect(readPeriod(args)).toBe("6mo");
	});

	it("captures --file with equals syntax", () => {
		const { command, args } = parseCliArgs(["campaigns", "--file=data/campaigns.csv", "--json"]);
		expect(command).toBe("campaigns");
		expect(args.file).toBe("data/campaigns.csv");
		expect(readFlag(args, "json")).toBe(true);
	});

	it("takes the ticker from the second positional", () => {
		const { args } = parseCliArgs(["stock", "msft", "--insight"]);
		expect(args.ticker).toBe("msft");
		expect(readFlag(args, "insight")).toBe(true);
	});

	it("rejects an unknown expertise level", () => {
		const { args } = parseCliArgs(["chat", "--level", "guru"]);
		expect(() => readExpertise(args)).toThrow(
			"Invalid --level guru; expected one of beginner, intermediate, expert"
		);
	});

	it("reports a missing required option", () => {
		const { args } = parseCliArgs(["campaigns", "--file"]);
		expect(() => requireString(args, "file", "path")).toThrow("--file needs a value");
		expect(() => requireString({}, "file", "path")).toThrow("Missing required --file <path>");
	});
});
