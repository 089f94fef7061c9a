import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { calculateChainMetrics, detectChains, getChainAlerts, gradeChain, processJobChains } from "../chains.js";
import { createInMemorySupabase } from "../testing/inMemorySupabase.js";
import { makeJob } from "./fixtures.js";

const NOW = "2024-03-15T06:00:00.000Z";

const chainJobs = [
  makeJob({ job_id: "J2", product_serial: "SN1", planned_date: "2024-03-05", status: "Rescheduled" }),
  makeJob({ job_id: "J3", product_serial: "SN1", planned_date: "2024-03-09", status: "Manifested" }),
  makeJob({ job_id: "J1", product_serial: "SN1", planned_date: "2024-03-01", status: "Re-scheduled" })
];

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("detectChains", () => {
  it("groups serials seen on two or more jobs, ordered by planned date", () => {
    const chains = detectChains([
      ...chainJobs,
      makeJob({ job_id: "K1", product_serial: "SN2" }),
      makeJob({ job_id: "X1", product_serial: "" }),
      makeJob({ job_id: "X2", product_serial: " " })
    ]);

    expect([...chains.keys()]).toEqual(["SN1"]);
    expect(chains.get("SN1")?.map((job) => job.job_id)).toEqual(["J1", "J2", "J3"]);
  });

  it("puts undated jobs last", () => {
    const chains = detectChains([
      makeJob({ job_id: "B", product_serial: "SN1", planned_date: null }),
      makeJob({ job_id: "A", product_serial: "SN1", planned_date: "2024-03-01" })
    ]);

    expect(chains.get("SN1")?.map((job) => job.job_id)).toEqual(["A", "B"]);
  });
});

describe("calculateChainMetrics", () => {
  it("counts reschedules and measures delay from the first planned date", () => {
    expect(calculateChainMetrics(chainJobs, "2024-03-15")).toEqual({
      total_jobs: 3,
      reschedule_count: 2,
      first_planned_date: "2024-03-01",
      final_planned_date: "2024-03-09",
      total_delay_days: 14,
      current_status: "Manifested",
      current_job_id: "J3"
    });
  });

  it("never reports a negative delay", () => {
    const metrics = calculateChainMetrics(
      [makeJob({ job_id: "A", planned_date: "2024-04-01" }), makeJob({ job_id: "B", planned_date: "2024-04-03" })],
      "2024-03-15"
    );

    expect(metrics.total_delay_days).toBe(0);
  });

  it("falls back to the last member when none is dated", () => {
    const metrics = calculateChainMetrics(
      [makeJob({ job_id: "A", status: "Rescheduled" }), makeJob({ job_id: "B", status: "Routed" })],
      "2024-03-15"
    );

    expect(metrics).toMatchObject({
      first_planned_date: null,
      total_delay_days: 0,
      current_job_id: "B",
      current_status: "Routed"
    });
  });
});

describe("processJobChains", () => {
  it("creates a chain and links its members in order", async () => {
    const { client, getTableRows } = createInMemorySupabase();

    const result = await processJobChains(client, chainJobs, { today: "2024-03-15", now: NOW });

    expect(result).toEqual({ chainsProcessed: 1, newChainsCreated: 1, jobsLinked: 3, errors: 0 });
    const [chain] = getTableRows("chains");
    expect(chain).toMatchObject({
      product_serial: "SN1",
      carrier: "ACME",
      total_jobs: 3,
      reschedule_count: 2,
      total_delay_days: 14,
      current_job_id: "J3",
      updated_at: NOW
    });
    const members = getTableRows("chain_members");
    expect(members.map((row) => [row.job_id, row.sequence_order])).toEqual([
      ["J1", 1],
      ["J2", 2],
      ["J3", 3]
    ]);
    expect(members.every((row) => row.chain_id === chain?.chain_id)).toBe(true);
  });

  it("keeps members linked by earlier imports", async () => {
    const { client, getTableRows } = createInMemorySupabase({
      chains: [{ chain_id: "c1", product_serial: "SN1", carrier: "ACME", total_jobs: 1, reschedule_count: 1 }],
      chain_members: [
        {
          id: "m0",
          chain_id: "c1",
          job_id: "J0",
          sequence_order: 1,
          status: "Rescheduled",
          planned_date: "2024-02-25",
          actual_date: null,
          delay_days: null
        }
      ]
    });

    const result = await processJobChains(client, chainJobs, { today: "2024-03-15", now: NOW });

    expect(result).toEqual({ chainsProcessed: 1, newChainsCreated: 0, jobsLinked: 3, errors: 0 });
    expect(getTableRows("chains")).toHaveLength(1);
    expect(getTableRows("chains")[0]).toMatchObject({
      chain_id: "c1",
      total_jobs: 4,
      reschedule_count: 3,
      first_planned_date: "2024-02-25",
      total_delay_days: 19
    });
    expect(getTableRows("chain_members").map((row) => [row.job_id, row.sequence_order])).toEqual([
      ["J0", 1],
      ["J1", 2],
      ["J2", 3],
      ["J3", 4]
    ]);
  });

  it("is idempotent across reruns of the same batch", async () => {
    const { client, getTableRows } = createInMemorySupabase();

    await processJobChains(client, chainJobs, { today: "2024-03-15", now: NOW });
    const rerun = await processJobChains(client, chainJobs, { today: "2024-03-15", now: NOW });

    expect(rerun.newChainsCreated).toBe(0);
    expect(getTableRows("chains")).toHaveLength(1);
    expect(getTableRows("chain_members")).toHaveLength(3);
    expect(getTableRows("chains")[0]?.reschedule_count).toBe(2);
  });

  it("counts a failing serial and carries on with the rest", async () => {
    const { client, getTableRows } = createInMemorySupabase(
      {},
      { failures: [{ table: "chain_members", operation: "upsert", times: 1 }] }
    );
    const jobs = [
      ...chainJobs,
      makeJob({ job_id: "K1", product_serial: "SN2", planned_date: "2024-03-02" }),
      makeJob({ job_id: "K2", product_serial: "SN2", planned_date: "2024-03-04" })
    ];

    const result = await processJobChains(client, jobs, { today: "2024-03-15", now: NOW });

    expect(result).toEqual({ chainsProcessed: 1, newChainsCreated: 1, jobsLinked: 2, errors: 1 });
    expect(getTableRows("chain_members").map((row) => row.job_id)).toEqual(["K1", "K2"]);
  });
});

describe("gradeChain", () => {
  it("grades by reschedules first, then by delay", () => {
    expect(gradeChain({ reschedule_count: 3, total_delay_days: 0 })).toEqual({
      severity: "critical",
      message: "Product rescheduled 3 times - investigate carrier"
    });
    expect(gradeChain({ reschedule_count: 2, total_delay_days: 30 })).toEqual({
      severity: "warning",
      message: "Product rescheduled 2 times"
    });
    expect(gradeChain({ reschedule_count: 0, total_delay_days: 14 })).toEqual({
      severity: "warning",
      message: "Product delayed 14 days from original planned date"
    });
    expect(gradeChain({ reschedule_count: 1, total_delay_days: 13 })).toBeNull();
  });
});

describe("getChainAlerts", () => {
  function chainRow(chain_id: string, reschedule_count: number, total_delay_days: number, current_status = "Manifested") {
    return {
      chain_id,
      product_serial: `SN-${chain_id}`,
      carrier: "ACME",
      total_jobs: reschedule_count + 1,
      reschedule_count,
      total_delay_days,
      current_status,
      current_job_id: `${chain_id}-job`
    };
  }

  it("returns open chains needing attention, most rescheduled first", async () => {
    const { client } = createInMemorySupabase({
      chains: [
        chainRow("C3", 1, 20),
        chainRow("C4", 1, 5),
        chainRow("C1", 3, 5),
        chainRow("C5", 4, 40, "Delivered"),
        chainRow("C2", 2, 20)
      ]
    });

    const alerts = await getChainAlerts(client, { pageSize: 2 });

    expect(alerts.map((alert) => [alert.chain_id, alert.severity])).toEqual([
      ["C1", "critical"],
      ["C2", "warning"],
      ["C3", "warning"]
    ]);
    expect(alerts[2]).toEqual({
      chain_id: "C3",
      product_serial: "SN-C3",
      carrier: "ACME",
      reschedule_count: 1,
      total_delay_days: 20,
      current_status: "Manifested",
      current_job_id: "C3-job",
      severity: "warning",
      message: "Product delayed 20 days from original planned date"
    });
  });

  it("throws when the chains cannot be read", async () => {
    const { client } = createInMemorySupabase({}, { failures: [{ table: "chains", operation: "select" }] });

    await expect(getChainAlerts(client)).rejects.toThrow("select on chains failed");
  });
});
