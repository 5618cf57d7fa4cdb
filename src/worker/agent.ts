import { describeError, RegistrationConflictError, TransportFailureError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { computeBackoffMs, sleep } from "../net/backoff";
import type { RegistrationResult, ReportResult } from "../protocol/types";
import type { ZoneId, ZoneSettings, ZoneSnapshot } from "../traffic/types";
import { ZoneEngine } from "../traffic/zoneEngine";
import type { MasterLink } from "./masterClient";

type AcceptedRegistration = Extract<RegistrationResult, { accepted: true }>;

const REPORT_ATTEMPTS = 2;

export interface WorkerAgentOptions {
  zoneId: ZoneId;
  address: string;
  workerId: string;
  link: MasterLink;
  zone: ZoneSettings;
  registrationAttempts: number;
  retryBaseMs: number;
  idleReregisterMs?: number;
  random?: () => number;
  onFatal?: (error: Error) => void;
  logger?: Logger;
}

/**
 * Owns one zone engine and speaks to the master on its behalf. Advances the
 * engine only when told to and only to the step it was told.
 */
export class WorkerAgent {
  readonly zoneId: ZoneId;
  readonly engine: ZoneEngine;
  private address: string;
  private workerId: string;
  private link: MasterLink;
  private registrationAttempts: number;
  private retryBaseMs: number;
  private idleReregisterMs?: number;
  private random: () => number;
  private onFatal?: (error: Error) => void;
  private logger: Logger;
  private registered: boolean;
  private joinStep: number | null;
  private reregistering: Promise<void> | null;
  private idleTimer: ReturnType<typeof setTimeout> | null;
  private stopped: boolean;

  constructor(options: WorkerAgentOptions) {
    this.zoneId = options.zoneId;
    this.engine = new ZoneEngine(options.zoneId, options.zone);
    this.address = options.address;
    this.workerId = options.workerId;
    this.link = options.link;
    this.registrationAttempts = Math.max(1, options.registrationAttempts);
    this.retryBaseMs = options.retryBaseMs;
    this.idleReregisterMs = options.idleReregisterMs;
    this.random = options.random ?? Math.random;
    this.onFatal = options.onFatal;
    this.logger = options.logger ?? createLogger(`worker:${options.zoneId}`);
    this.registered = false;
    this.joinStep = null;
    this.reregistering = null;
    this.idleTimer = null;
    this.stopped = false;
  }

  get isRegistered(): boolean {
    return this.registered;
  }

  get lastStep(): number {
    return this.engine.step;
  }

  get assignedJoinStep(): number | null {
    return this.joinStep;
  }

  /** One registration attempt. A conflict comes back as `accepted: false`. */
  async register(): Promise<RegistrationResult> {
    const result = await this.link.register({
      zoneId: this.zoneId,
      address: this.address,
      workerId: this.workerId
    });
    if (result.accepted) {
      this.registered = true;
      this.joinStep = result.joinStep;
      this.armIdleWatchdog();
    }
    return result;
  }

  /** Registers with bounded retries and exponential backoff; throws once attempts run out. */
  async connect(): Promise<AcceptedRegistration> {
    let lastError: Error | null = null;
    for (let attempt = 0; attempt < this.registrationAttempts; attempt += 1) {
      try {
        const result = await this.register();
        if (result.accepted) {
          this.logger.info(`registered as ${result.recordId}, joining at step ${result.joinStep}`);
          return result;
        }
        lastError = new RegistrationConflictError(this.zoneId, result.reason);
      } catch (error) {
        if (!(error instanceof TransportFailureError) || !error.retryable) {
          throw error;
        }
        lastError = error;
      }
      const remaining = this.registrationAttempts - attempt - 1;
      this.logger.warn(`registration attempt ${attempt + 1} failed: ${lastError.message} (${remaining} left)`);
      if (remaining > 0) {
        await sleep(computeBackoffMs(attempt, { baseMs: this.retryBaseMs, random: this.random }));
      }
    }
    throw lastError ?? new Error(`Zone ${this.zoneId} could not register.`);
  }

  async onStepCommand(step: number): Promise<ReportResult | null> {
    if (!this.registered) {
      this.logger.debug(`ignoring step ${step}: not registered`);
      return null;
    }
    if (step <= this.engine.step) {
      this.logger.debug(`ignoring step ${step}: already at step ${this.engine.step}`);
      return null;
    }
    this.armIdleWatchdog();
    const snapshot = this.engine.advanceStep(step);
    return this.report(snapshot);
  }

  /** Sends a snapshot, retrying the same one once on a transport failure. */
  async report(snapshot: ZoneSnapshot): Promise<ReportResult | null> {
    const request = { zoneId: this.zoneId, workerId: this.workerId, step: snapshot.step, snapshot };
    for (let attempt = 1; attempt <= REPORT_ATTEMPTS; attempt += 1) {
      try {
        const result = await this.link.report(request);
        this.handleReportResult(result, snapshot.step);
        return result;
      } catch (error) {
        if (!(error instanceof TransportFailureError)) {
          throw error;
        }
        if (!error.retryable || attempt === REPORT_ATTEMPTS) {
          this.logger.warn(`report for step ${snapshot.step} dropped: ${error.message}`);
          return null;
        }
        this.logger.debug(`report for step ${snapshot.step} failed, retrying once: ${error.message}`);
      }
    }
    return null;
  }

  stop(): void {
    this.stopped = true;
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private handleReportResult(result: ReportResult, step: number): void {
    switch (result.status) {
      case "accepted":
        return;
      case "late":
      case "unexpected":
        this.logger.debug(`report for step ${step} not counted (${result.status})`);
        return;
      case "rejected":
        this.logger.warn(`master rejected the snapshot for step ${step}; resyncing at the next command`);
        return;
      case "stale":
      case "unknown":
        this.logger.warn(`master lists this zone as ${result.status}; re-registering`);
        this.registered = false;
        this.reregister().catch((error: unknown) => {
          this.logger.error(`re-registration failed: ${describeError(error)}`);
        });
        return;
    }
  }

  private reregister(): Promise<void> {
    if (this.reregistering) {
      return this.reregistering;
    }
    this.reregistering = this.connect()
      .then(() => undefined)
      .catch((error: unknown) => {
        const fatal = error instanceof Error ? error : new Error(describeError(error));
        this.onFatal?.(fatal);
        throw fatal;
      })
      .finally(() => {
        this.reregistering = null;
      });
    return this.reregistering;
  }

  private armIdleWatchdog(): void {
    if (this.idleReregisterMs === undefined || this.stopped) {
      return;
    }
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
    }
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.onIdle().catch((error: unknown) => {
        this.logger.warn(`idle re-registration failed: ${describeError(error)}`);
      });
    }, this.idleReregisterMs);
    this.idleTimer.unref?.();
  }

  private async onIdle(): Promise<void> {
    this.logger.info(`no step command for ${this.idleReregisterMs} ms; checking registration`);
    try {
      const result = await this.register();
      if (result.accepted) {
        this.logger.info(`re-registered as ${result.recordId}`);
        return;
      }
      this.logger.debug(`still registered: ${result.reason}`);
    } finally {
      if (!this.registered || this.idleTimer === null) {
        this.armIdleWatchdog();
      }
    }
  }
}
