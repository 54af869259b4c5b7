import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  decideDeadlines,
  deadlineStatus,
  followUpDate,
  optimalSupplierDeadline,
  supplierDeadline,
} from "../policy";
import { addDays, diffDays } from "../../intel/dates";
import { DeadlineInputError } from "../../lib/errors";

const TODAY = "2026-10-19"; // Monday

const inputError = (field: string) => (e: unknown) =>
  e instanceof DeadlineInputError && e.field === field;

// ---------------------------------------------------------------------------
// supplierDeadline
// ---------------------------------------------------------------------------

describe("supplierDeadline", () => {
  it("subtracts the buffer", () => {
    assert.equal(supplierDeadline("2026-12-15", 2, TODAY), "2026-12-13");
    assert.equal(supplierDeadline("2026-12-15", 0, TODAY), "2026-12-15");
  });

  it("never goes before today", () => {
    assert.equal(supplierDeadline(TODAY, 2, TODAY), TODAY);
    assert.equal(supplierDeadline("2026-10-01", 2, TODAY), TODAY);
  });

  it("stays between today and the client deadline", () => {
    for (let ahead = 0; ahead < 20; ahead++) {
      const client = addDays(TODAY, ahead);
      for (let buffer = 0; buffer < 6; buffer++) {
        const supplier = supplierDeadline(client, buffer, TODAY);
        assert.ok(diffDays(TODAY, supplier) >= 0, `${client} -${buffer}`);
        assert.ok(diffDays(supplier, client) >= 0, `${client} -${buffer}`);
      }
    }
  });

  it("rejects bad buffers and dates", () => {
    assert.throws(
      () => supplierDeadline("2026-12-15", -1, TODAY),
      inputError("bufferDays")
    );
    assert.throws(
      () => supplierDeadline("2026-12-15", 1.5, TODAY),
      inputError("bufferDays")
    );
    assert.throws(
      () => supplierDeadline("2026-13-01", 2, TODAY),
      inputError("clientDeadline")
    );
  });
});

// ---------------------------------------------------------------------------
// optimalSupplierDeadline
// ---------------------------------------------------------------------------

describe("optimalSupplierDeadline", () => {
  const opts = { bufferDays: 2, today: TODAY };

  it("moves a weekend result back to Friday", () => {
    // 2026-12-13 is a Sunday
    assert.equal(optimalSupplierDeadline("2026-12-15", 1, opts), "2026-12-11");
  });

  it("scales the buffer by complexity, rounding down", () => {
    assert.equal(
      optimalSupplierDeadline("2026-12-15", 2.5, opts),
      "2026-12-10"
    );
  });

  it("keeps at least one day of buffer", () => {
    assert.equal(
      optimalSupplierDeadline("2026-12-15", 0.2, opts),
      "2026-12-14"
    );
  });

  it("falls forward to the next business day when the result is past", () => {
    assert.equal(optimalSupplierDeadline("2026-10-20", 1, opts), "2026-10-20");
  });

  it("rejects non-positive complexity", () => {
    assert.throws(
      () => optimalSupplierDeadline("2026-12-15", 0, opts),
      inputError("complexityFactor")
    );
    assert.throws(
      () => optimalSupplierDeadline("2026-12-15", Number.NaN, opts),
      inputError("complexityFactor")
    );
  });
});

// ---------------------------------------------------------------------------
// deadlineStatus
// ---------------------------------------------------------------------------

describe("deadlineStatus", () => {
  const cases: Array<[string, string, string, number]> = [
    ["2026-10-18", "overdue", "critical", -1],
    ["2026-10-19", "due_today", "critical", 0],
    ["2026-10-20", "due_soon", "high", 1],
    ["2026-10-21", "approaching", "medium", 2],
    ["2026-10-22", "approaching", "medium", 3],
    ["2026-10-23", "on_track", "low", 4],
  ];

  for (const [deadline, status, urgency, daysRemaining] of cases) {
    it(`classifies ${deadline}`, () => {
      const s = deadlineStatus(deadline, TODAY);
      assert.equal(s.status, status);
      assert.equal(s.urgency, urgency);
      assert.equal(s.daysRemaining, daysRemaining);
    });
  }

  it("flags weekend deadlines", () => {
    assert.equal(deadlineStatus("2026-10-18", TODAY).isBusinessDay, false);
    assert.equal(deadlineStatus("2026-10-23", TODAY).isBusinessDay, true);
  });
});

// ---------------------------------------------------------------------------
// decideDeadlines
// ---------------------------------------------------------------------------

describe("decideDeadlines", () => {
  it("describes the supplier deadline", () => {
    assert.deepEqual(decideDeadlines("2026-12-15", { today: TODAY }), {
      clientDeadline: "2026-12-15",
      supplierDeadline: "2026-12-13",
      urgency: "low",
      status: "on_track",
      daysRemaining: 55,
      clientDaysRemaining: 57,
      effectiveBufferDays: 2,
    });
  });

  it("is due today when the buffer reaches today", () => {
    const d = decideDeadlines("2026-10-21", { today: TODAY });
    assert.equal(d.supplierDeadline, TODAY);
    assert.equal(d.status, "due_today");
    assert.equal(d.urgency, "critical");
    assert.equal(d.clientDaysRemaining, 2);
    assert.equal(d.effectiveBufferDays, 2);
  });

  it("reports a clamped buffer", () => {
    const d = decideDeadlines("2026-10-20", { bufferDays: 3, today: TODAY });
    assert.equal(d.supplierDeadline, TODAY);
    assert.equal(d.effectiveBufferDays, 1);
  });
});

describe("followUpDate", () => {
  it("is the day after the quote deadline", () => {
    assert.equal(followUpDate("2026-12-13"), "2026-12-14");
    assert.equal(followUpDate("2026-12-31"), "2027-01-01");
  });
});
