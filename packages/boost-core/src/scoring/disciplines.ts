import type { Discipline, DisciplineScores } from '@boost-pipeline/shared-types';

/** Build a full six-discipline mapping from a per-discipline function. */
export function mapDisciplines(fn: (discipline: Discipline) => number): DisciplineScores {
  return {
    astronomy: fn('astronomy'),
    physics: fn('physics'),
    earth_science: fn('earth_science'),
    planetary_science: fn('planetary_science'),
    heliophysics: fn('heliophysics'),
    general: fn('general'),
  };
}
