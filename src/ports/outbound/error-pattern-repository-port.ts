import type { ErrorPattern } from '../../domain/entities/error-pattern.js';

export interface ErrorPatternRepositoryPort {
  /** Patterns in the order they must be tried. */
  loadPatterns(): Promise<readonly ErrorPattern[]>;

  getSourcePath(): string;
}
