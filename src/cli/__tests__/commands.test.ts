/**
 * Command boundary tests: failures end in a reported error and exit code 1,
 * never an unhandled rejection.
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { batchCommand } from "../commands/batch.js";
import { runCommand } from "../commands/run.js";

const MISSING_DB = "/nonexistent-attune-dir/runs.db";

function captureStderr() {
    return vi.spyOn(process.stderr, "write").mockImplementation(() => true);
}

function reportedError(stderr: ReturnType<typeof captureStderr>): string {
    expect(stderr).toHaveBeenCalledTimes(1);
    const parsed: unknown = JSON.parse(String(stderr.mock.calls[0][0]));
    if (typeof parsed !== "object" || parsed === null || !("error" in parsed)) {
        throw new Error("stderr did not carry an error object");
    }
    return String(parsed.error);
}

afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
});

describe("runCommand()", () => {
    it("reports a database in a missing directory instead of throwing", async () => {
        const stderr = captureStderr();

        await expect(
            runCommand({ profile: ["helper"], scenario: "x", json: true, db: MISSING_DB }),
        ).resolves.toBeUndefined();

        expect(process.exitCode).toBe(1);
        expect(reportedError(stderr)).toMatch(/directory does not exist/);
    });

    it("requires a profile selection", async () => {
        const stderr = captureStderr();

        await runCommand({ scenario: "x", json: true, persist: false });

        expect(process.exitCode).toBe(1);
        expect(reportedError(stderr)).toBe("Pass --profile <id...> or --all-profiles.");
    });

    it("rejects --profile together with --all-profiles", async () => {
        const stderr = captureStderr();

        await runCommand({ profile: ["mentor"], allProfiles: true, scenario: "x", json: true, persist: false });

        expect(process.exitCode).toBe(1);
        expect(reportedError(stderr)).toBe("Use either --profile or --all-profiles, not both.");
    });
});

describe("batchCommand()", () => {
    it("reports a database in a missing directory instead of throwing", async () => {
        const stderr = captureStderr();

        await expect(batchCommand({ file: "pairs.json", json: true, db: MISSING_DB })).resolves.toBeUndefined();

        expect(process.exitCode).toBe(1);
        expect(reportedError(stderr)).toMatch(/directory does not exist/);
    });
});
