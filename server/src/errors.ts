export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidBodyIdError extends CatalogError {
  constructor(readonly bodyId: string) {
    super(`Unexpected body id ${bodyId}`);
  }
}

/** The solver only handles orbits measured around the Sun. */
export class UnsupportedCenterError extends CatalogError {
  constructor(readonly refId: string) {
    super(`Unsupported reference center ${refId}: only heliocentric elements can be solved`);
  }
}

export class NonPositivePeriodError extends CatalogError {
  constructor(readonly period: number) {
    super(`Orbital period must be positive, got ${period}`);
  }
}

export class UnsupportedOrbitError extends CatalogError {
  constructor(readonly eccentricity: number) {
    super(`Only elliptic orbits (0 <= e < 1) can be solved, got e=${eccentricity}`);
  }
}

export class FrameShiftError extends CatalogError {}

export class SeriesInvariantError extends CatalogError {
  constructor(
    readonly bodyId: string,
    readonly series: 'oscElements' | 'stateVectors'
  ) {
    super(`Series ${series} of body ${bodyId} is not strictly ascending by key`);
  }
}

export class SourceValidationError extends CatalogError {
  constructor(
    readonly origin: string,
    readonly issues: string[]
  ) {
    super(`Invalid source ${origin}: ${issues.join('; ')}`);
  }
}

export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
