import test from "node:test";
import assert from "node:assert/strict";

import { ResourceListSpec, buildSegments, encodeListQuery, isActiveGroup, listEndpoint, viewEndpoint } from "./list-query.js";

const invoices: ResourceListSpec = {
  resource: "invoices",
  maxPerPage: 200,
  defaultPerPage: 50,
  defaultSort: "regular_count",
  defaultDirection: "DESC",
  filters: ["status", "client_id", "search"],
  rangeFields: ["created", "due"],
};

test("defaults produce the fixed paging prefix", () => {
  assert.deepEqual(encodeListQuery(invoices), ["page:1", "per_page:50", "listinfo:1", "direction:DESC", "sort:regular_count"]);
});

test("per_page is clamped to the resource maximum", () => {
  const segments = encodeListQuery(invoices, { perPage: 1000 });
  assert.equal(segments[1], "per_page:200");
  assert.equal(encodeListQuery({ ...invoices, maxPerPage: 100 }, { perPage: 150 })[1], "per_page:100");
});

test("status and a since-only range encode in order", () => {
  const segments = encodeListQuery(invoices, {
    page: 1,
    perPage: 200,
    filters: { status: 2 },
    ranges: { created: { since: "2024-01-01" } },
  });

  assert.deepEqual(segments, [
    "page:1",
    "per_page:200",
    "listinfo:1",
    "direction:DESC",
    "sort:regular_count",
    "status:2",
    "created:3",
    "created_since:2024-01-01",
  ]);
});

test("scalar filters follow declared order, not argument order", () => {
  const segments = encodeListQuery(invoices, {
    listinfo: false,
    direction: "ASC",
    sort: "created",
    filters: { search: "YWNtZQ==", client_id: 12, status: "1|2" },
  });

  assert.deepEqual(segments.slice(2), ["listinfo:0", "direction:ASC", "sort:created", "status:1|2", "client_id:12", "search:YWNtZQ=="]);
});

test("a range group with both bounds emits marker, since, to", () => {
  const segments = encodeListQuery(invoices, {
    ranges: { due: { since: "2024-02-01", to: "2024-02-29" }, created: { to: "2024-03-31" } },
  });

  assert.deepEqual(segments.slice(5), ["created:3", "created_to:2024-03-31", "due:3", "due_since:2024-02-01", "due_to:2024-02-29"]);
});

test("inactive groups and blank filters emit nothing", () => {
  assert.equal(isActiveGroup({ fieldName: "created" }), false);
  assert.equal(isActiveGroup({ fieldName: "created", since: "" }), false);
  assert.equal(isActiveGroup({ fieldName: "created", to: "2024-01-01" }), true);

  const segments = encodeListQuery(invoices, { filters: { status: "" }, ranges: { created: { since: " " } } });
  assert.equal(segments.length, 5);
});

test("segments are modelled as named kinds", () => {
  const kinds = buildSegments(invoices, { filters: { status: 1 }, ranges: { due: { since: "2024-01-01" } } }).map((s) => s.kind);
  assert.deepEqual(kinds, ["paging", "paging", "paging", "paging", "paging", "filter", "range-marker", "range-bound"]);
});

test("list and view endpoints", () => {
  assert.equal(listEndpoint("clients", ["page:2", "per_page:10"]), "clients/index.json/page:2/per_page:10");
  assert.equal(viewEndpoint("expenses", 31), "expenses/view/31.json");
});
