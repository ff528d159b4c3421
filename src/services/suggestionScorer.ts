import { ManagerRegistry } from "../managers.js";
import { CatalogEntry, ScoredSuggestion, SearchCandidate } from "../types.js";
import { similarity } from "./similarity.js";

export const PACKAGE_ID_BONUS = 0.2;
export const MANAGER_ID_BONUS = 0.1;
export const SAME_MANAGER_BONUS = 0.05;

export class SuggestionScorer {
  constructor(private readonly registry: ManagerRegistry) {}

  score(entry: CatalogEntry, managerIdentifier: string | undefined, candidate: SearchCandidate): number {
    const scores = [similarity(entry.packageId, candidate.identifier)];
    if (entry.name) {
      scores.push(similarity(entry.name, candidate.name));
      scores.push(similarity(entry.name, candidate.identifier));
    }
    if (managerIdentifier) {
      scores.push(similarity(managerIdentifier, candidate.identifier));
    }

    let score = Math.max(...scores);
    const identifier = candidate.identifier.toLowerCase();

    if (identifier === entry.packageId.toLowerCase()) {
      score = clamp(score + PACKAGE_ID_BONUS);
    }
    if (managerIdentifier && identifier === managerIdentifier.toLowerCase()) {
      score = clamp(score + MANAGER_ID_BONUS);
    }
    if (this.registry.canonical(candidate.manager) === this.registry.canonical(entry.manager)) {
      score = clamp(score + SAME_MANAGER_BONUS);
    }

    return score;
  }

  scoreAll(
    entry: CatalogEntry,
    managerIdentifier: string | undefined,
    candidates: Iterable<SearchCandidate>
  ): ScoredSuggestion[] {
    const scored: ScoredSuggestion[] = [];
    for (const candidate of candidates) {
      scored.push({ ...candidate, score: this.score(entry, managerIdentifier, candidate) });
    }
    return rankSuggestions(scored);
  }
}

/** Highest score first; Array.prototype.sort is stable, so ties keep discovery order. */
export function rankSuggestions(suggestions: ScoredSuggestion[]): ScoredSuggestion[] {
  return [...suggestions].sort((left, right) => right.score - left.score);
}

function clamp(value: number): number {
  return Math.min(value, 1);
}
