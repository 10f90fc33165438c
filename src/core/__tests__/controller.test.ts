/**
 * ConvergenceController Tests — the attempt loop against scripted
 * transports and table-driven scorers; no live LLM.
 */
import { describe, it, expect, vi } from "vitest";
import { ConvergenceController, expectConverged } from "../controller.js";
import type { ConvergenceControllerOptions } from "../controller.js";
import { ReliableTransport } from "../../llm/transport.js";
import { mutate } from "../../engine/mutator.js";
import { ConvergenceExhaustedError } from "../../errors/index.js";
import type { Logger } from "../logger.js";
import type { ConvergenceResult } from "../types.js";
import {
    ScriptedOracle,
    ScriptedTransport,
    failedOutcome,
    makeConfig,
    makeStore,
    noSleep,
    okOutcome,
    tableScorer,
} from "../../__tests__/fixtures.js";

const SCENARIO = "A friend is nervous before an interview.";

function makeController(overrides: Partial<ConvergenceControllerOptions> & Pick<ConvergenceControllerOptions, "transport">) {
    return new ConvergenceController({
        profiles: makeStore(),
        config: makeConfig(),
        sleep: noSleep,
        ...overrides,
    });
}

function mockLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("ConvergenceController.run()", () => {
    it("converges on the third attempt after two mutations", async () => {
        const transport = new ScriptedTransport([okOutcome("r1"), okOutcome("r2"), okOutcome("r3")]);
        const persisted: ConvergenceResult[] = [];
        const sleeps: number[] = [];
        const controller = makeController({
            transport,
            config: makeConfig({ inter_attempt_delay_ms: 2000 }),
            scorer: tableScorer({ r1: 0.4, r2: 0.6, r3: 0.9 }),
            sink: { persist: (result) => { persisted.push(result); } },
            sleep: async (ms) => { sleeps.push(ms); },
        });

        const result = await controller.run("helper", SCENARIO);

        expect(result.status).toBe("success");
        expect(result.totalAttempts).toBe(3);
        expect(result.successfulAttempt).toBe(3);
        expect(result.bestAttempt?.index).toBe(3);
        expect(result.reason).toBe("Converged on attempt 3: overall 0.900 ≥ threshold 0.85");
        expect(transport.requests.map((r) => r.strategy)).toEqual([undefined, "tone_amplifier", "comprehensive_amplifier"]);
        expect(transport.requests.map((r) => r.generation)).toEqual([0, 1, 2]);
        expect(sleeps).toEqual([2000, 2000]);
        expect(persisted).toEqual([result]);
    });

    it("stops after max_attempts sends when every call is rate limited", async () => {
        const oracle = new ScriptedOracle([{ status: "rate_limited", message: "429 Too Many Requests" }]);
        const transport = new ReliableTransport({ oracle, sleep: noSleep });
        const persist = vi.fn();
        const controller = makeController({
            transport,
            config: makeConfig({ max_retries: 1 }),
            sink: { persist },
        });

        const result = await controller.run("helper", SCENARIO);

        expect(oracle.calls).toBe(3);
        expect(result.status).toBe("error");
        expect(result.bestAttempt).toBeNull();
        expect(result.totalAttempts).toBe(3);
        expect(result.reason).toBe("No valid response in 3 attempt(s); last transport error: rate_limited (429 Too Many Requests)");
        expect(persist).not.toHaveBeenCalled();
    });

    it("resends the same request after a transport failure", async () => {
        const transport = new ScriptedTransport([failedOutcome(), okOutcome("low"), failedOutcome("timeout")]);
        const controller = makeController({ transport, scorer: tableScorer({ low: 0.3 }) });

        const result = await controller.run("helper", SCENARIO);

        expect(transport.requests[1]).toBe(transport.requests[0]);
        expect(transport.requests[2].strategy).toBe("comprehensive_amplifier");
        expect(result.status).toBe("failure");
        expect(result.bestAttempt?.index).toBe(2);
        expect(result.attempts[0].breakdown).toBeNull();
    });

    it("returns an error without sending for an unknown profile", async () => {
        const transport = new ScriptedTransport([okOutcome("unused")]);
        const controller = makeController({ transport });

        const result = await controller.run("ghost", SCENARIO);

        expect(result.status).toBe("error");
        expect(result.reason).toBe('Profile "ghost" not found.');
        expect(result.attempts).toEqual([]);
        expect(transport.requests).toHaveLength(0);
    });

    it("reports the best attempt on failure", async () => {
        const transport = new ScriptedTransport([okOutcome("a"), okOutcome("b"), okOutcome("c")]);
        const controller = makeController({ transport, scorer: tableScorer({ a: 0.5, b: 0.7, c: 0.6 }) });

        const result = await controller.run("helper", SCENARIO);

        expect(result.status).toBe("failure");
        expect(result.successfulAttempt).toBeNull();
        expect(result.bestAttempt?.index).toBe(2);
        expect(result.reason).toBe(
            "Best overall 0.700 (attempt 2) stayed below threshold 0.85 after 3 attempts; weakest dimension: tone",
        );
    });

    it("keeps the earlier attempt on a tie", async () => {
        const transport = new ScriptedTransport([okOutcome("a"), okOutcome("b")]);
        const controller = makeController({
            transport,
            config: makeConfig({ max_attempts: 2 }),
            scorer: tableScorer({ a: 0.5, b: 0.5 }),
        });

        const result = await controller.run("helper", SCENARIO);

        expect(result.bestAttempt?.index).toBe(1);
    });

    it("never sends more than max_attempts requests", async () => {
        for (const maxAttempts of [1, 2, 5]) {
            const transport = new ScriptedTransport([okOutcome("low")]);
            const controller = makeController({
                transport,
                config: makeConfig({ max_attempts: maxAttempts }),
                scorer: tableScorer({ low: 0.1 }),
            });
            const result = await controller.run("helper", SCENARIO);
            expect(transport.requests).toHaveLength(maxAttempts);
            expect(result.totalAttempts).toBe(maxAttempts);
        }
    });

    it("mutates at most max_attempts - 1 times", async () => {
        for (const maxAttempts of [1, 2, 5]) {
            const mutator = vi.fn(mutate);
            const controller = makeController({
                transport: new ScriptedTransport([okOutcome("low")]),
                config: makeConfig({ max_attempts: maxAttempts }),
                scorer: tableScorer({ low: 0.1 }),
                mutator,
            });
            await controller.run("helper", SCENARIO);
            expect(mutator).toHaveBeenCalledTimes(maxAttempts - 1);
        }
    });

    it("never mutates when every send fails", async () => {
        const mutator = vi.fn(mutate);
        const controller = makeController({
            transport: new ScriptedTransport([failedOutcome()]),
            config: makeConfig({ max_attempts: 3 }),
            mutator,
        });

        const result = await controller.run("helper", SCENARIO);

        expect(result.status).toBe("error");
        expect(result.totalAttempts).toBe(3);
        expect(mutator).not.toHaveBeenCalled();
    });

    it("keeps a success when the sink fails", async () => {
        const logger = mockLogger();
        const controller = makeController({
            transport: new ScriptedTransport([okOutcome("great")]),
            scorer: tableScorer({ great: 0.95 }),
            sink: { persist: async () => { throw new Error("disk full"); } },
            logger,
        });

        const result = await controller.run("helper", SCENARIO);

        expect(result.status).toBe("success");
        expect(logger.error).toHaveBeenCalledWith("provenance.persist_failed", {
            runId: result.runId,
            message: "disk full",
        });
    });

    it("discards the in-flight outcome when cancelled during a send", async () => {
        const abort = new AbortController();
        const transport = new ScriptedTransport([okOutcome("great")]);
        const send = transport.send.bind(transport);
        transport.send = async (request, config) => {
            abort.abort();
            return send(request, config);
        };
        const controller = makeController({ transport, scorer: tableScorer({ great: 0.95 }) });

        const result = await controller.run("helper", SCENARIO, { signal: abort.signal });

        expect(result.status).toBe("error");
        expect(result.reason).toBe("Cancelled after 0 attempt(s)");
        expect(transport.requests).toHaveLength(1);
    });

    it("sends nothing when already cancelled", async () => {
        const transport = new ScriptedTransport([okOutcome("x")]);
        const controller = makeController({ transport });

        const result = await controller.run("helper", SCENARIO, { signal: AbortSignal.abort() });

        expect(result.status).toBe("error");
        expect(transport.requests).toHaveLength(0);
    });

    it("emits lifecycle events", async () => {
        const controller = makeController({
            transport: new ScriptedTransport([okOutcome("a"), okOutcome("b")]),
            scorer: tableScorer({ a: 0.2, b: 0.9 }),
        });
        const events: string[] = [];
        for (const name of ["run:start", "attempt:start", "attempt:complete", "run:complete"]) {
            controller.on(name, () => events.push(name));
        }

        await controller.run("helper", SCENARIO);

        expect(events).toEqual([
            "run:start",
            "attempt:start",
            "attempt:complete",
            "attempt:start",
            "attempt:complete",
            "run:complete",
        ]);
    });

    it("returns a frozen result", async () => {
        const controller = makeController({
            transport: new ScriptedTransport([okOutcome("a")]),
            scorer: tableScorer({ a: 0.9 }),
        });
        const result = await controller.run("helper", SCENARIO);
        expect(Object.isFrozen(result)).toBe(true);
        expect(Object.isFrozen(result.attempts)).toBe(true);
        expect(Object.isFrozen(result.attempts[0])).toBe(true);
    });
});

describe("expectConverged()", () => {
    it("passes a success through and throws otherwise", async () => {
        const ok = await makeController({
            transport: new ScriptedTransport([okOutcome("a")]),
            scorer: tableScorer({ a: 0.9 }),
        }).run("helper", SCENARIO);
        expect(expectConverged(ok).runId).toBe(ok.runId);

        const missing = await makeController({ transport: new ScriptedTransport([okOutcome("a")]) }).run("ghost", SCENARIO);
        expect(() => expectConverged(missing)).toThrow(ConvergenceExhaustedError);
    });
});
