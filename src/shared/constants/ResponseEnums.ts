/**
 * Response status values used in HTTP bodies.
 *
 * @module shared/constants/ResponseEnums
 */
export enum ResponseStatus {
  OK = "ok",
  ERROR = "error",
}
