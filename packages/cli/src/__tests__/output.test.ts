import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { fatal, formatTime, print, printTable, warn } from "../output";

describe("output helpers", () => {
	let mockStdout: string[];
	let mockStderr: string[];

	beforeEach(() => {
		mockStdout = [];
		mockStderr = [];
		vi.spyOn(process.stdout, "write").mockImplementation((data) => {
			mockStdout.push(String(data));
			return true;
		});
		vi.spyOn(process.stderr, "write").mockImplementation((data) => {
			mockStderr.push(String(data));
			return true;
		});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("print writes a line to stdout", () => {
		print("hello");
		expect(mockStdout).toEqual(["hello\n"]);
	});

	it("warn prefixes stderr output", () => {
		warn("careful");
		expect(mockStderr).toEqual(["Warning: careful\n"]);
	});

	it("fatal writes to stderr and exits with code 1", () => {
		const exit = vi.spyOn(process, "exit").mockImplementation(() => {
			throw new Error("process.exit");
		});
		expect(() => fatal("broken")).toThrow("process.exit");
		expect(mockStderr).toEqual(["Error: broken\n"]);
		expect(exit).toHaveBeenCalledWith(1);
	});

	it("printTable aligns columns", () => {
		printTable([
			{ OBJECT: "7", STATE: "pending" },
			{ OBJECT: "1234", STATE: "failed_terminal" },
		]);
		expect(mockStdout).toEqual([
			"OBJECT  STATE\n",
			"------  ---------------\n",
			"7       pending\n",
			"1234    failed_terminal\n",
		]);
	});

	it("printTable prints a placeholder for no rows", () => {
		printTable([]);
		expect(mockStdout).toEqual(["(none)\n"]);
	});

	it("formatTime renders ISO strings and a dash for null", () => {
		expect(formatTime(0)).toBe("1970-01-01T00:00:00.000Z");
		expect(formatTime(null)).toBe("-");
	});
});
