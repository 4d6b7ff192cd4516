import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { run } from "../src/cli";

describe("run", () => {
  let dir: string;

  const logged = () => vi.mocked(console.log).mock.calls.map((call) => call[0]);

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "credit-terms-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints the plain sweep for the required keys", () => {
    const file = path.join(dir, "input.json");
    writeFileSync(file, JSON.stringify({ "Credit amount": 120_000, "Credit rate": [0], "Expected inflation": [0] }));

    expect(run([file])).toBe(0);
    const lines = logged();
    expect(lines[0]).toBe(`Credit parameters input file path: ${file}`);
    expect(lines).toContain("Credit rate: [0]");
    expect(lines).toContain("10 years: Monthly payment: 1000.00, Total cost: 120000.00, Inflation-adjusted cost: 120000.00");
    expect(lines).not.toContain("Credit with overpayment calculations:");
  });

  it("prints every mode when the budget keys are present", () => {
    const file = path.join(dir, "input.json");
    writeFileSync(file, JSON.stringify({
      "Credit amount": 12_000, "Credit rate": [0], "Expected inflation": [0],
      "Acceptable monthly payment": [1_000], "Investment interest rate": [0],
    }));

    expect(run([file])).toBe(0);
    const lines = logged();
    expect(lines).toContain("Credit with overpayment calculations:");
    expect(lines).toContain("Credit with investment calculations:");
    // paid off in 12 months, 24 months of budget saved
    expect(lines).toContain(
      "3 years: Monthly payment: 1000.00, Total cost: -12000.00, Inflation-adjusted cost: -12000.00, Investment balance: 24000.00",
    );
  });

  it("writes the chart page on request", () => {
    const file = path.join(dir, "input.json");
    const chart = path.join(dir, "chart.html");
    writeFileSync(file, JSON.stringify({ "Credit amount": 50_000, "Credit rate": [4], "Expected inflation": [2] }));

    expect(run([file, "--chart", chart])).toBe(0);
    expect(readFileSync(chart, "utf8").startsWith("<!doctype html>")).toBe(true);
  });

  it("exits 1 with an error line when the chart cannot be written", () => {
    const file = path.join(dir, "input.json");
    const chart = path.join(dir, "missing", "chart.html");
    writeFileSync(file, JSON.stringify({ "Credit amount": 50_000, "Credit rate": [4], "Expected inflation": [2] }));

    expect(run([file, "--chart", chart])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^ERROR: Failed to write the chart page /));
  });

  it("writes the sample file with --init", () => {
    const file = path.join(dir, "sample.json");
    expect(run([file, "--init"])).toBe(0);
    expect(existsSync(file)).toBe(true);
    expect(logged()).toEqual([`Sample credit parameters written to ${file}`]);
  });

  it("exits 1 with an error line for an invalid file", () => {
    const file = path.join(dir, "input.json");
    writeFileSync(file, JSON.stringify({ "Credit amount": 1_000, "Credit rate": [] , "Expected inflation": [1] }));

    expect(run([file])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "ERROR: Credit rate is empty, please add some values under the 'Credit rate' key",
    );
  });

  it("exits 1 on an unknown option", () => {
    expect(run(["--verbose"])).toBe(1);
    expect(console.error).toHaveBeenLastCalledWith("Usage: credit-terms [input.json] [--chart <file>] [--init]");
  });
});
