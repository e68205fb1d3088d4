// backend/services/docs/test/jobRunner.spec.ts
import { describe, it, expect, vi } from "vitest";
import { JobRunner } from "../src/services/jobRunner";

function makeLog() {
  return { debug: vi.fn(), error: vi.fn() };
}

describe("JobRunner", () => {
  it("starts a job after the current tick", async () => {
    const log = makeLog();
    const jobs = new JobRunner(log);
    let ran = false;

    jobs.schedule("flag", async () => {
      ran = true;
    });
    expect(ran).toBe(false);
    expect(jobs.pending).toBe(1);

    await jobs.drain();
    expect(ran).toBe(true);
    expect(jobs.pending).toBe(0);
    expect(log.debug).toHaveBeenCalledWith({ job: "flag" }, "job done");
  });

  it("logs failures without rethrowing", async () => {
    const log = makeLog();
    const jobs = new JobRunner(log);
    const err = new Error("llm down");

    jobs.schedule("boom", async () => {
      throw err;
    });
    await jobs.drain();

    expect(log.error).toHaveBeenCalledWith({ job: "boom", err }, "job failed");
  });

  it("drain waits for jobs scheduled by other jobs", async () => {
    const jobs = new JobRunner(makeLog());
    const order: string[] = [];

    jobs.schedule("outer", async () => {
      order.push("outer");
      jobs.schedule("inner", async () => {
        order.push("inner");
      });
    });
    await jobs.drain();

    expect(order).toEqual(["outer", "inner"]);
  });
});
