// rulecore/session/TemplateNarrator.ts

import type { NarrationRequest, Narrator } from "./SessionTypes";

/** Plain template prose. Stands in for a model-backed narrator. */
export class TemplateNarrator implements Narrator {
  narrate({ input, result }: NarrationRequest): Promise<string> {
    const parts: string[] = [];

    if (result.success) {
      parts.push(`You ${result.actionTaken}.`);
    } else if (result.actionTaken) {
      parts.push(`You try to ${result.actionTaken}, but ${result.failureReason ?? "it does not work"}.`);
    } else {
      parts.push(`You try to ${input.trim() || "act"}, but ${result.failureReason ?? "nothing happens"}.`);
    }

    for (const change of result.worldChanges) {
      parts.push(`${change.charAt(0).toUpperCase()}${change.slice(1)}.`);
    }

    return Promise.resolve(parts.join(" "));
  }
}
