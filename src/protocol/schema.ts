import { z } from "zod";

const headingSchema = z.enum(["N", "S", "E", "W"]);
const phaseSchema = z.enum(["NS_GREEN", "EW_GREEN"]);
const zoneIdSchema = z.string().trim().min(1).max(64);
const stepSchema = z.number().int().min(1);
const finite = z.number().finite();

const vehicleStateSchema = z.object({
  id: z.string().min(1),
  heading: headingSchema,
  offset: finite.min(0),
  speed: finite.min(0),
  turn: z.enum(["left", "right", "straight"]).nullable(),
  turned: z.boolean(),
  x: finite,
  y: finite
});

const lightStateSchema = z.object({
  id: z.string().min(1),
  phase: phaseSchema,
  elapsed: z.number().int().min(0),
  cycleLength: z.number().int().min(1),
  x: finite,
  y: finite
});

export const zoneSnapshotSchema = z
  .object({
    zoneId: zoneIdSchema,
    step: stepSchema,
    vehicles: z.array(vehicleStateSchema),
    lights: z.array(lightStateSchema),
    counters: z.object({
      active: z.number().int().min(0),
      spawned: z.number().int().min(0),
      despawned: z.number().int().min(0)
    })
  })
  .refine((snapshot) => snapshot.counters.active === snapshot.vehicles.length, {
    message: "counters.active must equal the number of vehicles",
    path: ["counters", "active"]
  })
  .refine((snapshot) => new Set(snapshot.vehicles.map((vehicle) => vehicle.id)).size === snapshot.vehicles.length, {
    message: "vehicle ids must be unique",
    path: ["vehicles"]
  });

export const registrationRequestSchema = z.object({
  zoneId: zoneIdSchema,
  address: z.string().url(),
  workerId: z.string().min(1).optional()
});

export const reportRequestSchema = z
  .object({
    zoneId: zoneIdSchema,
    workerId: z.string().min(1).optional(),
    step: stepSchema,
    snapshot: zoneSnapshotSchema
  })
  .refine((report) => report.snapshot.zoneId === report.zoneId && report.snapshot.step === report.step, {
    message: "snapshot zoneId and step must match the report",
    path: ["snapshot"]
  });

export const stepCommandSchema = z.object({
  step: stepSchema
});

export const registrationResponseSchema = z.discriminatedUnion("accepted", [
  z.object({
    accepted: z.literal(true),
    zoneId: zoneIdSchema,
    recordId: z.string().min(1),
    joinStep: z.number().int().min(1)
  }),
  z.object({
    accepted: z.literal(false),
    reason: z.string()
  })
]);

export const reportResponseSchema = z.object({
  received: z.boolean(),
  status: z.enum(["accepted", "late", "unexpected", "stale", "unknown", "rejected"]),
  resync: z.boolean().optional()
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
