import { randomUUID } from "node:crypto";
import { NotFoundError, ValidationError } from "../errors.js";
import type { ScalarValue } from "./data-types.js";
import { type ClassifiedInput, type InputOverview, overviewInputs } from "./input-classifier.js";
import type { CollectedInputs, VerificationReport } from "./verification.js";

export type InputState = "pending" | "staged" | "confirmed";

export type SessionPhase = "collecting" | "staged" | "confirmed" | "verified" | "assembled";

export type StagedValue =
  | { kind: "template"; content: string }
  | { kind: "parameter"; value: ScalarValue };

// `content` is the text the user approved; the storage fields say where it went.
export type ConfirmedValue =
  | {
      kind: "template";
      content: string;
      file_url?: string;
      stored_content?: string;
      filename?: string;
      file_size?: number;
    }
  | { kind: "parameter"; value: ScalarValue };

type TrackedInput = {
  input: ClassifiedInput;
  state: InputState;
  staged?: StagedValue;
  // What the user saw when the current confirmation was given.
  accepted?: StagedValue;
  confirmed?: ConfirmedValue;
};

function reviewedValue(value: ConfirmedValue): StagedValue {
  return value.kind === "template" ? { kind: "template", content: value.content } : value;
}

function sameValue(left: StagedValue, right: StagedValue): boolean {
  if (left.kind === "template" && right.kind === "template") {
    return left.content.trim() === right.content.trim();
  }
  if (left.kind === "parameter" && right.kind === "parameter") {
    return left.value === right.value;
  }
  return false;
}

function describeValue(value: StagedValue): string {
  return value.kind === "template" ? "the collected content" : `'${String(value.value)}'`;
}

export type SessionSnapshot = {
  session_id: string;
  rule_name: string;
  selected_tasks: string[];
  phase: SessionPhase;
  inputs: Array<{ unique_input_id: string; category: ClassifiedInput["category"]; required: boolean; state: InputState }>;
  counts: Record<InputState, number>;
  rule_id?: string;
};

// Server-side record of one rule being authored. Tracks each declared input
// through pending → staged → confirmed; `verified` and `assembled` are set
// explicitly by the verification and creation steps.
export class RuleWorkflowSession {
  readonly id = randomUUID();
  private readonly inputs = new Map<string, TrackedInput>();
  private verified = false;
  private ruleId?: string;

  constructor(
    readonly ruleName: string,
    readonly overview: InputOverview
  ) {
    for (const input of overviewInputs(overview)) {
      this.inputs.set(input.unique_input_id, { input, state: "pending" });
    }
  }

  get phase(): SessionPhase {
    if (this.ruleId !== undefined) return "assembled";
    if (this.verified) return "verified";
    const states = Array.from(this.inputs.values(), (tracked) => tracked.state);
    if (states.every((state) => state === "confirmed")) return "confirmed";
    if (states.some((state) => state !== "pending")) return "staged";
    return "collecting";
  }

  declaredInputs(): ClassifiedInput[] {
    return Array.from(this.inputs.values(), (tracked) => tracked.input);
  }

  stateOf(uniqueInputId: string): InputState {
    return this.track(uniqueInputId).state;
  }

  stage(uniqueInputId: string, value: StagedValue): void {
    const tracked = this.mutable(uniqueInputId);
    this.checkKind(tracked, value.kind);
    tracked.staged = value;
    tracked.state = "staged";
    this.verified = false;
  }

  // Throws unless `candidate` is exactly what was staged (or, with nothing
  // staged, what was confirmed before). Callers with side effects, such as an
  // upload, check first and confirm afterwards.
  assertConfirmable(uniqueInputId: string, candidate: StagedValue): void {
    this.confirmable(uniqueInputId, candidate);
  }

  confirm(uniqueInputId: string, value: ConfirmedValue): void {
    const tracked = this.confirmable(uniqueInputId, reviewedValue(value));
    tracked.accepted = tracked.staged ?? tracked.accepted;
    tracked.confirmed = value;
    tracked.staged = undefined;
    tracked.state = "confirmed";
    this.verified = false;
  }

  reject(uniqueInputId: string): void {
    const tracked = this.mutable(uniqueInputId);
    if (tracked.state !== "staged") {
      throw new ValidationError(`Input ${uniqueInputId} has no staged value to reject`);
    }
    tracked.staged = undefined;
    tracked.state = tracked.confirmed ? "confirmed" : "pending";
  }

  markVerified(report: VerificationReport): void {
    this.assertOpen();
    this.verified = report.ready_for_creation;
  }

  markAssembled(ruleId: string): void {
    this.assertOpen();
    this.ruleId = ruleId;
  }

  toCollectedInputs(): CollectedInputs {
    const collected: CollectedInputs = { template_files: {}, parameter_values: {} };
    for (const [id, { input, confirmed }] of this.inputs) {
      if (confirmed?.kind === "template") {
        collected.template_files[id] = {
          ...(confirmed.file_url ? { file_url: confirmed.file_url } : {}),
          ...(confirmed.stored_content ? { stored_content: confirmed.stored_content } : {}),
          ...(confirmed.filename ? { filename: confirmed.filename } : {}),
          ...(confirmed.file_size === undefined ? {} : { file_size: confirmed.file_size }),
          format: input.format ?? "text",
          data_type: input.data_type,
          required: input.required,
          validated: true,
        };
      } else if (confirmed?.kind === "parameter") {
        collected.parameter_values[id] = {
          value: confirmed.value,
          data_type: input.data_type,
          required: input.required,
        };
      }
    }
    return collected;
  }

  snapshot(): SessionSnapshot {
    const counts: Record<InputState, number> = { pending: 0, staged: 0, confirmed: 0 };
    const inputs = Array.from(this.inputs.values(), ({ input, state }) => {
      counts[state] += 1;
      return { unique_input_id: input.unique_input_id, category: input.category, required: input.required, state };
    });
    return {
      session_id: this.id,
      rule_name: this.ruleName,
      selected_tasks: this.overview.selected_tasks,
      phase: this.phase,
      inputs,
      counts,
      ...(this.ruleId === undefined ? {} : { rule_id: this.ruleId }),
    };
  }

  private track(uniqueInputId: string): TrackedInput {
    const tracked = this.inputs.get(uniqueInputId);
    if (!tracked) {
      throw new NotFoundError(`Input ${uniqueInputId} is not part of session ${this.id}`);
    }
    return tracked;
  }

  private mutable(uniqueInputId: string): TrackedInput {
    this.assertOpen();
    return this.track(uniqueInputId);
  }

  private assertOpen(): void {
    if (this.ruleId !== undefined) {
      throw new ValidationError(`Session ${this.id} already created rule ${this.ruleId} and can no longer change`);
    }
  }

  private confirmable(uniqueInputId: string, candidate: StagedValue): TrackedInput {
    const tracked = this.mutable(uniqueInputId);
    this.checkKind(tracked, candidate.kind);
    const reviewed = tracked.staged ?? tracked.accepted;
    if (tracked.state === "pending" || !reviewed) {
      throw new ValidationError(`Input ${uniqueInputId} has not been collected yet; collect it before confirming`);
    }
    if (!sameValue(reviewed, candidate)) {
      throw new ValidationError(
        `Confirmed value for ${uniqueInputId} differs from ${describeValue(reviewed)} shown to the user; collect it again to change it`
      );
    }
    return tracked;
  }

  private checkKind(tracked: TrackedInput, kind: StagedValue["kind"]): void {
    if (tracked.input.category !== kind) {
      throw new ValidationError(`Input ${tracked.input.unique_input_id} is a ${tracked.input.category} input`);
    }
  }
}

export type Clock = () => number;

export type SessionStoreOptions = {
  // Sessions untouched for this long are dropped on the next store access.
  idleTtlMs: number;
  clock?: Clock;
};

export const DEFAULT_SESSION_IDLE_TTL_MS = 60 * 60 * 1000;

export class WorkflowSessionStore {
  private readonly sessions = new Map<string, { session: RuleWorkflowSession; touchedAt: number }>();
  private readonly idleTtlMs: number;
  private readonly clock: Clock;

  constructor(options: SessionStoreOptions = { idleTtlMs: DEFAULT_SESSION_IDLE_TTL_MS }) {
    this.idleTtlMs = options.idleTtlMs;
    this.clock = options.clock ?? (() => Date.now());
  }

  get size(): number {
    this.evictIdle();
    return this.sessions.size;
  }

  create(ruleName: string, overview: InputOverview): RuleWorkflowSession {
    this.evictIdle();
    const session = new RuleWorkflowSession(ruleName, overview);
    this.sessions.set(session.id, { session, touchedAt: this.clock() });
    return session;
  }

  get(id: string): RuleWorkflowSession {
    this.evictIdle();
    const entry = this.sessions.get(id);
    if (!entry) {
      throw new NotFoundError(`Rule session ${id} not found`);
    }
    entry.touchedAt = this.clock();
    return entry.session;
  }

  // Removes the session and returns its final state.
  close(id: string): SessionSnapshot {
    const snapshot = this.get(id).snapshot();
    this.sessions.delete(id);
    return snapshot;
  }

  private evictIdle(): void {
    const cutoff = this.clock() - this.idleTtlMs;
    for (const [id, entry] of this.sessions) {
      if (entry.touchedAt <= cutoff) {
        console.error(`rule session ${id} (${entry.session.ruleName}) expired after ${this.idleTtlMs} ms idle`);
        this.sessions.delete(id);
      }
    }
  }
}
