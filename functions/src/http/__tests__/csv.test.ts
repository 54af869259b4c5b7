import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { csvEscape, ordersToCsv } from "../csv";
import { buildOrderRecord, OrderInput } from "../../orders/tracker";

const HEADER =
  "Order_ID,Project_Name,Tender_Reference,Date_Processed,Materials,Total_Suppliers,Emails_Sent,Supplier_Categories,Quote_Deadline,Status,Follow_Up_Date,Notes";

describe("csvEscape", () => {
  it("quotes only when needed", () => {
    assert.equal(csvEscape("plain"), "plain");
    assert.equal(csvEscape("a, b"), '"a, b"');
    assert.equal(csvEscape('6" pipe'), '"6"" pipe"');
    assert.equal(csvEscape("line\nbreak"), '"line\nbreak"');
    assert.equal(csvEscape(3), "3");
    assert.equal(csvEscape(null), "");
  });
});

describe("ordersToCsv", () => {
  it("writes only the header for no orders", () => {
    assert.equal(ordersToCsv([]), HEADER);
  });

  it("writes one row per order", () => {
    const order = buildOrderRecord(
      OrderInput.parse({
        projectName: "Jubail",
        materials: ["valves", "flanges"],
        quoteDeadline: "2026-12-13",
      }),
      new Date("2026-10-19T08:05:09Z")
    );
    assert.equal(
      ordersToCsv([order]),
      `${HEADER}\nORD-20261019-080509,Jubail,,2026-10-19 08:05:09,"valves, flanges",0,0,,2026-12-13,Pending Response,2026-12-14,`
    );
  });
});
