import type { Task } from "../catalog/task-catalog.js";
import { ValidationError } from "../errors.js";

export const NO_CREDENTIAL_APP_TYPE = "nocredapp";
export const DEFAULT_APP_TYPE = "generic";

export type AppTypeCandidate = {
  app_type: string;
  tasks: string[];
};

export type AppTypeResolution =
  | { status: "resolved"; app_type: string; source: "single" | "chosen"; candidates: AppTypeCandidate[] }
  | { status: "ambiguous"; candidates: AppTypeCandidate[]; message: string }
  | { status: "default"; app_type: string; candidates: AppTypeCandidate[] };

type AppTagged = Pick<Task, "name" | "appTags">;

function collectCandidates(tasks: AppTagged[]): AppTypeCandidate[] {
  const byType = new Map<string, AppTypeCandidate>();
  for (const task of tasks) {
    for (const raw of task.appTags.appType ?? []) {
      const appType = raw.trim();
      if (!appType || appType.toLowerCase() === NO_CREDENTIAL_APP_TYPE) continue;
      const candidate = byType.get(appType) ?? { app_type: appType, tasks: [] };
      if (!candidate.tasks.includes(task.name)) candidate.tasks.push(task.name);
      byType.set(appType, candidate);
    }
  }
  return Array.from(byType.values());
}

// Picks the application type the rule is labelled with. Tasks that need no
// credentials do not vote.
export function determinePrimaryAppType(tasks: AppTagged[], chosen?: string): AppTypeResolution {
  const candidates = collectCandidates(tasks);
  const pick = chosen?.trim();

  if (pick) {
    const match = candidates.find((candidate) => candidate.app_type.toLowerCase() === pick.toLowerCase());
    if (!match) {
      throw new ValidationError(`App type '${pick}' is not used by any selected task`, [], {
        candidates: candidates.map((candidate) => candidate.app_type).join(", "),
      });
    }
    return { status: "resolved", app_type: match.app_type, source: "chosen", candidates };
  }

  const [only] = candidates;
  if (only === undefined) {
    return { status: "default", app_type: DEFAULT_APP_TYPE, candidates };
  }
  if (candidates.length === 1) {
    return { status: "resolved", app_type: only.app_type, source: "single", candidates };
  }
  return {
    status: "ambiguous",
    candidates,
    message:
      "The selected tasks target different applications:\n" +
      candidates.map((candidate) => `- ${candidate.app_type} (used by ${candidate.tasks.join(", ")})`).join("\n") +
      "\nWhich application should this rule be labelled with?",
  };
}
