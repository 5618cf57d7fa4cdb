import type { z } from "zod";
import { MalformedPayloadError } from "../errors";
import type { ZoneId, ZoneSnapshot } from "../traffic/types";
import {
  formatIssues,
  registrationRequestSchema,
  registrationResponseSchema,
  reportRequestSchema,
  reportResponseSchema,
  stepCommandSchema
} from "./schema";

export type RegistrationRequest = z.infer<typeof registrationRequestSchema>;
export type RegistrationResult = z.infer<typeof registrationResponseSchema>;
export type StepCommand = z.infer<typeof stepCommandSchema>;
export type ReportResult = z.infer<typeof reportResponseSchema>;
export type ReportStatus = ReportResult["status"];

export interface ReportRequest {
  zoneId: ZoneId;
  workerId?: string;
  step: number;
  snapshot: ZoneSnapshot;
}

export interface HistoryPoint {
  step: number;
  activeVehicles: number;
}

export interface GlobalTotals {
  activeVehicles: number;
  spawned: number;
  despawned: number;
  reportingZones: number;
}

export interface GlobalSnapshot {
  readonly step: number;
  readonly zones: Readonly<Record<ZoneId, ZoneSnapshot>>;
  readonly staleZones: readonly ZoneId[];
  readonly missingZones: readonly ZoneId[];
  readonly carriedZones: readonly ZoneId[];
  readonly partial: boolean;
  readonly totals: GlobalTotals;
  readonly settledAtIso: string;
  readonly durationMs: number;
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new MalformedPayloadError(what, formatIssues(result.error));
  }
  return result.data;
}

export function parseRegistrationRequest(raw: unknown): RegistrationRequest {
  return parseWith(registrationRequestSchema, "registration", raw);
}

export function parseReportRequest(raw: unknown): ReportRequest {
  return parseWith(reportRequestSchema, "report", raw);
}

export function parseStepCommand(raw: unknown): StepCommand {
  return parseWith(stepCommandSchema, "step command", raw);
}

export function parseRegistrationResult(raw: unknown): RegistrationResult {
  return parseWith(registrationResponseSchema, "registration response", raw);
}

export function parseReportResult(raw: unknown): ReportResult {
  return parseWith(reportResponseSchema, "report response", raw);
}
