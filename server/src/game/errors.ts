/**
 * Engine error types
 *
 * Validation problems travel as values ({ ok: false, reason }); these classes
 * are only thrown for programming errors and for internal inconsistencies.
 */

/**
 * A Move was built from marbles that do not form a 1-3 marble line
 */
export class MalformedMoveError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'MalformedMoveError';
  }
}

/**
 * The move generator and the legality engine disagree, e.g. the search
 * returned a move the rules reject. Never expected in a correct build.
 */
export class EngineInvariantError extends Error {
  readonly notation: string | null;

  constructor(message: string, notation: string | null = null) {
    super(message);
    this.name = 'EngineInvariantError';
    this.notation = notation;
  }
}
