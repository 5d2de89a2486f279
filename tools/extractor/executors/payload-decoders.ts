import { z } from "zod";
import { PayloadParseError } from "../pipeline/errors.js";
import type { RawValue } from "./types.js";

export const DEFAULT_HOVER_FIELDS = ["Numerator", "Denominator"] as const;

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const scalarListSchema = z.union([z.array(scalarSchema), scalarSchema]);
const textListSchema = z.union([z.array(z.string()), z.string()]);
const titleSchema = z.union([z.string(), z.object({ text: z.string().optional() })]).optional();

const plotlyTraceSchema = z.object({
  type: z.string().optional(),
  name: z.union([z.string(), z.number()]).optional(),
  x: scalarListSchema.optional(),
  y: scalarListSchema.optional(),
  hovertemplate: textListSchema.optional(),
  hovertext: textListSchema.optional(),
  text: textListSchema.optional(),
});

const plotlyWidgetSchema = z.object({
  x: z.object({
    data: z.array(plotlyTraceSchema).min(1),
    layout: z
      .object({
        title: titleSchema,
        xaxis: z.object({ title: titleSchema }).optional(),
        yaxis: z.object({ title: titleSchema }).optional(),
      })
      .optional(),
  }),
});

const namedValuesSchema = z.object({
  name: z.union([z.string(), z.number()]).optional(),
  values: z.array(scalarSchema),
});

const parallelSeriesSchema = z.union([
  z.object({
    title: z.string().optional(),
    categories: z.array(scalarSchema),
    series: z.array(namedValuesSchema).min(1),
  }),
  z.object({
    title: z.string().optional(),
    categories: z.array(scalarSchema),
    name: z.union([z.string(), z.number()]).optional(),
    values: z.array(scalarSchema),
  }),
]);

const pointSchema = z.record(z.string(), scalarSchema);

const pointSeriesSchema = z.union([
  z.array(pointSchema).min(1),
  z.object({
    title: z.string().optional(),
    name: z.union([z.string(), z.number()]).optional(),
    points: z.array(pointSchema).min(1),
  }),
  z.object({
    title: z.string().optional(),
    series: z
      .array(
        z.object({
          name: z.union([z.string(), z.number()]).optional(),
          points: z.array(pointSchema),
        })
      )
      .min(1),
  }),
]);

export interface DecodeContext {
  elementId: string;
  contextTitle?: string;
  hoverFields: readonly string[];
}

export type DecodedPoint = Record<string, RawValue>;
type DecodedPointInput = z.infer<typeof pointSchema>;

export interface DecodedChart {
  title?: string;
  points: DecodedPoint[];
}

export interface PayloadDecoder {
  readonly name: string;
  // null declines the payload
  decode(payload: unknown, context: DecodeContext): DecodedChart | null;
}

export const plotlyWidgetDecoder: PayloadDecoder = {
  name: "plotly-widget",
  decode(payload, context) {
    const parsed = plotlyWidgetSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    const { data, layout } = parsed.data.x;
    // Scatter charts lead with a reference trace that carries no series data.
    const traces = data[0].type === "scatter" && data.length > 1 ? data.slice(1) : data;
    const series = traces.filter((trace) => trace.x !== undefined && trace.y !== undefined);
    if (series.length === 0) {
      return null;
    }

    const categoryField = titleText(layout?.xaxis?.title) || "category";
    const chartTitle = titleText(layout?.title);
    const points: DecodedPoint[] = [];

    for (const trace of series) {
      const xs = asList(trace.x);
      const ys = asList(trace.y);
      if (xs.length !== ys.length) {
        throw new PayloadParseError(
          context.elementId,
          `trace ${JSON.stringify(trace.name ?? "")} has ${xs.length} categories and ${ys.length} values`
        );
      }
      const valueField =
        nameText(trace.name) ||
        titleText(layout?.yaxis?.title) ||
        chartTitle ||
        context.contextTitle ||
        "value";
      const hoverSources = [trace.hovertemplate, trace.hovertext, trace.text];

      xs.forEach((x, index) => {
        points.push({
          [categoryField]: toRawValue(x),
          [valueField]: toRawValue(ys[index]),
          ...hoverFieldsAt(hoverSources, index, context.hoverFields),
        });
      });
    }

    return { title: chartTitle || undefined, points };
  },
};

export const parallelSeriesDecoder: PayloadDecoder = {
  name: "parallel-series",
  decode(payload, context) {
    const parsed = parallelSeriesSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    const chart = parsed.data;
    const series = "series" in chart ? chart.series : [{ name: chart.name, values: chart.values }];
    const points: DecodedPoint[] = [];

    for (const entry of series) {
      if (entry.values.length !== chart.categories.length) {
        throw new PayloadParseError(
          context.elementId,
          `series ${JSON.stringify(entry.name ?? "")} has ${entry.values.length} values for ${chart.categories.length} categories`
        );
      }
      const valueField = nameText(entry.name) || chart.title || context.contextTitle || "value";
      chart.categories.forEach((category, index) => {
        points.push({
          category: toRawValue(category),
          [valueField]: toRawValue(entry.values[index]),
        });
      });
    }

    return { title: chart.title, points };
  },
};

export const pointSeriesDecoder: PayloadDecoder = {
  name: "point-series",
  decode(payload, context) {
    const parsed = pointSeriesSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    const chart = parsed.data;
    const series: Array<{ name?: string | number; title?: string; points: DecodedPointInput[] }> =
      Array.isArray(chart)
        ? [{ points: chart }]
        : "series" in chart
          ? chart.series.map((entry) => ({ ...entry, title: chart.title }))
          : [{ name: chart.name, title: chart.title, points: chart.points }];

    const points = series.flatMap((entry) => {
      const valueField = nameText(entry.name) || entry.title || context.contextTitle || "value";
      return entry.points.map((point) => {
        const out: DecodedPoint = {};
        for (const [key, value] of Object.entries(point)) {
          out[genericKeyName(key, valueField)] = toRawValue(value);
        }
        return out;
      });
    });
    return { title: Array.isArray(chart) ? undefined : chart.title, points };
  },
};

// First decoder to accept a payload owns it.
export const PAYLOAD_DECODERS: readonly PayloadDecoder[] = [
  plotlyWidgetDecoder,
  parallelSeriesDecoder,
  pointSeriesDecoder,
];

export function decodeChartPayload(
  payload: unknown,
  context: DecodeContext
): ({ decoder: string } & DecodedChart) | null {
  for (const decoder of PAYLOAD_DECODERS) {
    const chart = decoder.decode(payload, context);
    if (chart) {
      return { decoder: decoder.name, ...chart };
    }
  }
  return null;
}

export function hoverFields(text: string | undefined, wanted: readonly string[]): DecodedPoint {
  const out: DecodedPoint = {};
  if (!text || wanted.length === 0) {
    return out;
  }
  const byLower = new Map(wanted.map((label): [string, string] => [label.toLowerCase(), label]));
  for (const segment of text.split(/<br\s*\/?>/i)) {
    const plain = segment.replace(/<[^>]*>/g, "").trim();
    const match = /^([^:]+):\s*(.*)$/.exec(plain);
    if (!match) {
      continue;
    }
    const label = byLower.get(match[1].trim().toLowerCase());
    const value = match[2].trim();
    if (label && !value.includes("%{")) {
      out[label] = value;
    }
  }
  return out;
}

// Earlier sources win a label; template placeholders never count as values.
function hoverFieldsAt(
  sources: ReadonlyArray<string | string[] | undefined>,
  index: number,
  wanted: readonly string[]
): DecodedPoint {
  const out: DecodedPoint = {};
  for (const source of sources) {
    for (const [label, value] of Object.entries(hoverFields(hoverTextAt(source, index), wanted))) {
      if (!(label in out)) {
        out[label] = value;
      }
    }
  }
  return out;
}

function hoverTextAt(hover: string | string[] | undefined, index: number): string | undefined {
  if (hover === undefined) {
    return undefined;
  }
  return Array.isArray(hover) ? hover[index] : hover;
}

function genericKeyName(key: string, valueField: string): string {
  if (key === "x") {
    return "category";
  }
  if (key === "y") {
    return valueField;
  }
  return key;
}

function asList<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function titleText(title: string | { text?: string } | undefined): string {
  if (title === undefined) {
    return "";
  }
  return (typeof title === "string" ? title : title.text ?? "").trim();
}

function nameText(name: string | number | undefined): string {
  return name === undefined ? "" : String(name).trim();
}

function toRawValue(value: string | number | boolean | null | undefined): RawValue {
  if (value === undefined || value === null) {
    return null;
  }
  return typeof value === "boolean" ? String(value) : value;
}
