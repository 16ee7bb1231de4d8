// Normalizes raw engine profile payloads into ExecutionProfile
import { z } from "zod";
import { InputError } from "../errors";
import type { ExecutionProfile, OperatorNode, OperatorType } from "../../../shared/types";

const count = z.number().nonnegative().nullish();

const OperatorSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  operatorType: z.string(),
  name: z.string().optional(),
  inputRecords: z.number().nonnegative().default(0),
  outputRecords: z.number().nonnegative().default(0)
});

export const RawProfileSchema = z.object({
  queryProfile: z
    .object({
      memoryAllocated: count,
      peakMemory: count,
      rowsScanned: count,
      rowsReturned: count,
      dataScanned: count,
      cpuTimeMs: count
    })
    .default({}),
  scanInfo: z
    .object({
      totalPartitions: count,
      scannedPartitions: count
    })
    .nullish(),
  acceleration: z
    .object({
      reflections: z.array(z.object({ id: z.string() })).default([])
    })
    .nullish(),
  operators: z.array(OperatorSchema).default([])
});

export type RawProfile = z.input<typeof RawProfileSchema>;

const OPERATOR_KEYWORDS: [RegExp, OperatorType][] = [
  [/JOIN/, "join"],
  [/SCAN/, "scan"],
  [/AGG/, "aggregate"],
  [/FILTER|SELECTION/, "filter"],
  [/PROJECT/, "project"],
  [/SORT|TOP_?N/, "sort"],
  [/EXCHANGE|SENDER|RECEIVER/, "exchange"]
];

export function classifyOperator(operatorType: string): OperatorType {
  const upper = operatorType.toUpperCase();
  for (const [pattern, type] of OPERATOR_KEYWORDS) {
    if (pattern.test(upper)) return type;
  }
  return "other";
}

export function parseEngineProfile(executionId: string, raw: unknown): ExecutionProfile {
  const parsed = RawProfileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new InputError(`Invalid profile for execution ${executionId}: ${issues}`);
  }

  const { queryProfile: qp, scanInfo, acceleration, operators } = parsed.data;
  const reflections = acceleration?.reflections ?? [];

  return {
    executionId,
    rowsScanned: qp.rowsScanned ?? null,
    rowsReturned: qp.rowsReturned ?? null,
    bytesScanned: qp.dataScanned ?? null,
    partitionsScanned: scanInfo?.scannedPartitions ?? null,
    partitionsTotal: scanInfo?.totalPartitions ?? null,
    memoryAllocatedBytes: qp.memoryAllocated ?? null,
    peakMemoryBytes: qp.peakMemory ?? null,
    cpuTimeMs: qp.cpuTimeMs ?? null,
    accelerationUsed: reflections.length > 0,
    accelerationIds: reflections.map((r) => r.id),
    operators: operators.map(
      (op): OperatorNode => ({
        id: op.id,
        type: classifyOperator(op.operatorType),
        name: op.name,
        inputRows: op.inputRecords,
        outputRows: op.outputRecords
      })
    )
  };
}
