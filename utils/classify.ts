import { nameKey, type CountryCandidate } from "../models/country";

export interface WritePlan {
  inserts: CountryCandidate[];
  updates: CountryCandidate[];
}

/**
 * Split candidates into inserts and updates by natural key. Persisted
 * countries missing from the candidates are left alone.
 */
export function classifyCandidates(
  candidates: CountryCandidate[],
  existingNames: Iterable<string>
): WritePlan {
  const existing = new Set<string>();
  for (const name of existingNames) {
    existing.add(nameKey(name));
  }

  const plan: WritePlan = { inserts: [], updates: [] };
  for (const candidate of candidates) {
    if (existing.has(nameKey(candidate.name))) {
      plan.updates.push(candidate);
    } else {
      plan.inserts.push(candidate);
    }
  }
  return plan;
}
