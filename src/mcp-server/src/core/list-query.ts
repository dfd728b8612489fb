import { SortDirection } from "./types.js";
import { isFilled } from "./utils.js";

/** Filter-mode value the API expects before explicit since/to bounds. */
export const RANGE_MODE_MARKER = 3;

export type ResourceListSpec = {
  /** Path prefix, e.g. "invoices". */
  resource: string;
  maxPerPage: number;
  defaultPerPage: number;
  defaultSort: string;
  defaultDirection: SortDirection;
  /** Scalar filters, emitted in this order. */
  filters: readonly string[];
  /** Range-capable fields, emitted in this order after all scalar filters. */
  rangeFields: readonly string[];
};

export type FilterGroup = {
  fieldName: string;
  since?: string;
  to?: string;
};

export type RangeBounds = {
  since?: string;
  to?: string;
};

export type ListQueryParams = {
  page?: number;
  perPage?: number;
  listinfo?: boolean;
  direction?: SortDirection;
  sort?: string;
  filters?: Readonly<Record<string, string | number | undefined>>;
  ranges?: Readonly<Record<string, RangeBounds | undefined>>;
};

export type QuerySegment =
  | { kind: "paging"; key: "page" | "per_page" | "listinfo" | "direction" | "sort"; value: string }
  | { kind: "filter"; key: string; value: string }
  | { kind: "range-marker"; field: string }
  | { kind: "range-bound"; field: string; bound: "since" | "to"; value: string };

export function isActiveGroup(group: FilterGroup): boolean {
  return isFilled(group.since) || isFilled(group.to);
}

export function renderSegment(segment: QuerySegment): string {
  switch (segment.kind) {
    case "paging":
    case "filter":
      return `${segment.key}:${segment.value}`;
    case "range-marker":
      return `${segment.field}:${RANGE_MODE_MARKER}`;
    case "range-bound":
      return `${segment.field}_${segment.bound}:${segment.value}`;
  }
}

function groupSegments(group: FilterGroup): QuerySegment[] {
  if (!isActiveGroup(group)) return [];
  const out: QuerySegment[] = [{ kind: "range-marker", field: group.fieldName }];
  if (group.since !== undefined && isFilled(group.since)) {
    out.push({ kind: "range-bound", field: group.fieldName, bound: "since", value: group.since });
  }
  if (group.to !== undefined && isFilled(group.to)) {
    out.push({ kind: "range-bound", field: group.fieldName, bound: "to", value: group.to });
  }
  return out;
}

/**
 * Builds the ordered segment list. `per_page` is silently clamped to the resource maximum:
 * oversized requests get the maximum, with no error and no signal to the caller.
 */
export function buildSegments(spec: ResourceListSpec, params: ListQueryParams = {}): QuerySegment[] {
  const page = params.page ?? 1;
  const perPage = Math.min(params.perPage ?? spec.defaultPerPage, spec.maxPerPage);
  const listinfo = params.listinfo ?? true;

  const segments: QuerySegment[] = [
    { kind: "paging", key: "page", value: String(page) },
    { kind: "paging", key: "per_page", value: String(perPage) },
    { kind: "paging", key: "listinfo", value: listinfo ? "1" : "0" },
    { kind: "paging", key: "direction", value: params.direction ?? spec.defaultDirection },
    { kind: "paging", key: "sort", value: params.sort ?? spec.defaultSort },
  ];

  const filters = params.filters ?? {};
  for (const key of spec.filters) {
    const value = filters[key];
    if (value === undefined || !isFilled(value)) continue;
    segments.push({ kind: "filter", key, value: String(value) });
  }

  const ranges = params.ranges ?? {};
  for (const fieldName of spec.rangeFields) {
    const bounds = ranges[fieldName];
    segments.push(...groupSegments({ fieldName, since: bounds?.since, to: bounds?.to }));
  }

  return segments;
}

export function encodeListQuery(spec: ResourceListSpec, params: ListQueryParams = {}): string[] {
  return buildSegments(spec, params).map(renderSegment);
}

export function listEndpoint(resource: string, segments: readonly string[]): string {
  return `${resource}/index.json/${segments.join("/")}`;
}

export function viewEndpoint(resource: string, id: number | string): string {
  return `${resource}/view/${id}.json`;
}
