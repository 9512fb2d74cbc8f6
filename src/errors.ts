import type { Violation } from "./types.js";

export class InvalidCoordinateError extends Error {
  readonly name = "InvalidCoordinateError";

  constructor(
    readonly field: "lat" | "lng",
    readonly value: number
  ) {
    const range = field === "lat" ? "-90..90" : "-180..180";
    super(`Invalid ${field === "lat" ? "latitude" : "longitude"} ${value}: expected a number in ${range}`);
  }
}

/** Boundary text that can't be read as coordinate pairs */
export class MalformedBoundaryError extends Error {
  readonly name = "MalformedBoundaryError";

  constructor(
    readonly token: string,
    readonly position: number,
    reason: string
  ) {
    super(position > 0 ? `Malformed boundary point #${position} "${token}": ${reason}` : `Malformed boundary: ${reason}`);
  }
}

export class ZoneValidationError extends Error {
  readonly name = "ZoneValidationError";

  constructor(
    readonly zoneId: string,
    readonly violations: Violation[]
  ) {
    super(`Zone ${zoneId} is invalid: ${violations.map((v) => v.message).join("; ")}`);
  }
}

export class NotFoundError extends Error {
  readonly name = "NotFoundError";

  constructor(
    readonly resource: string,
    readonly id: string
  ) {
    super(`${resource} ${id} not found`);
  }
}
