/**
 * Engine error taxonomy
 *
 * Every failure the engine reports is a RouteEngineError subclass with a stable code,
 * so the API layer can map kinds to responses without inspecting messages.
 */

export type RouteEngineErrorCode =
  | 'INTEGRITY_ERROR'
  | 'STATION_NOT_FOUND'
  | 'NO_PATH'
  | 'INVALID_PASSENGER_TYPE'
  | 'FARE_RULE_MISSING'
  | 'SEARCH_BUDGET_EXCEEDED'
  | 'INVALID_REQUEST'
  | 'SNAPSHOT_UNAVAILABLE';

export abstract class RouteEngineError extends Error {
  abstract readonly code: RouteEngineErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed topology or fare data; the rebuild attempt is abandoned
 */
export class IntegrityError extends RouteEngineError {
  readonly code = 'INTEGRITY_ERROR';
  readonly retryable = false;

  constructor(readonly issues: string[]) {
    super(`Network data failed integrity checks: ${issues.join('; ')}`, { issues });
  }
}

export class StationNotFoundError extends RouteEngineError {
  readonly code = 'STATION_NOT_FOUND';
  readonly retryable = false;

  constructor(readonly stationId: string) {
    super(`Station not found: ${stationId}`, { stationId });
  }
}

/**
 * No path under the current closures; may succeed once the overlay changes
 */
export class NoPathError extends RouteEngineError {
  readonly code = 'NO_PATH';
  readonly retryable = true;

  constructor(readonly origin: string, readonly destination: string) {
    super(`No path from ${origin} to ${destination}`, { origin, destination });
  }
}

export class InvalidPassengerTypeError extends RouteEngineError {
  readonly code = 'INVALID_PASSENGER_TYPE';
  readonly retryable = false;

  constructor(readonly passengerType: string) {
    super(`Unknown passenger type: ${passengerType}`, { passengerType });
  }
}

/**
 * Operational data gap: a ride was priced on a (line, zone) with no rule
 */
export class FareRuleMissingError extends RouteEngineError {
  readonly code = 'FARE_RULE_MISSING';
  readonly retryable = false;

  constructor(readonly lineId: string, readonly zone: number) {
    super(`No fare rule for line ${lineId} zone ${zone}`, { lineId, zone });
  }
}

export class SearchBudgetExceededError extends RouteEngineError {
  readonly code = 'SEARCH_BUDGET_EXCEEDED';
  readonly retryable = true;

  constructor(readonly maxFrontierPops: number) {
    super(`Route search exceeded ${maxFrontierPops} frontier pops`, { maxFrontierPops });
  }
}

export class InvalidRequestError extends RouteEngineError {
  readonly code = 'INVALID_REQUEST';
  readonly retryable = false;

  constructor(message: string, readonly field?: string) {
    super(message, field ? { field } : {});
  }
}

export class SnapshotUnavailableError extends RouteEngineError {
  readonly code = 'SNAPSHOT_UNAVAILABLE';
  readonly retryable = true;

  constructor() {
    super('Network snapshot has not been built yet');
  }
}
