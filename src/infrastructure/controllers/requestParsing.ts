import { CONFIG } from "../../config/config";
import { CraftErrorCode } from "../../shared/constants/CraftingEnums";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { NetworkErrorCode } from "../../shared/constants/NetworkEnums";
import type { StorageNetworkResult } from "../../shared/types/storage";
import type { Position } from "../../shared/types/world";

/**
 * Input readers and response shapers shared by the controllers.
 * Readers return undefined for anything malformed; callers answer 400.
 */

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim().length > 0) return Number(value);
  return undefined;
}

export function readInteger(value: unknown): number | undefined {
  const parsed = toNumber(value);
  return parsed !== undefined && Number.isInteger(parsed) ? parsed : undefined;
}

export function readPosition(value: unknown): Position | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  if (!("x" in value) || !("y" in value)) return undefined;
  const x = readInteger(value.x);
  const y = readInteger(value.y);
  return x !== undefined && y !== undefined ? { x, y } : undefined;
}

export function readItemId(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export function readQuantity(value: unknown): number | undefined {
  const quantity = readInteger(value ?? 1);
  if (quantity === undefined || quantity <= 0 || quantity > CONFIG.MAX_CRAFT_QUANTITY) {
    return undefined;
  }
  return quantity;
}

export function networkErrorStatus(error: NetworkErrorCode | undefined): HttpStatusCode {
  switch (error) {
    case NetworkErrorCode.NETWORK_NOT_FOUND:
      return HttpStatusCode.NOT_FOUND;
    case NetworkErrorCode.NO_ROOT_CONNECTED:
      return HttpStatusCode.CONFLICT;
    case NetworkErrorCode.NETWORK_TOO_LARGE:
      return HttpStatusCode.PAYLOAD_TOO_LARGE;
    default:
      return HttpStatusCode.UNPROCESSABLE_ENTITY;
  }
}

export function isNetworkError(
  error: CraftErrorCode | NetworkErrorCode | undefined,
): error is NetworkErrorCode {
  return Object.values(NetworkErrorCode).some((code) => code === error);
}

export function craftErrorStatus(error: CraftErrorCode | NetworkErrorCode | undefined): HttpStatusCode {
  if (error === undefined) return HttpStatusCode.OK;
  if (isNetworkError(error)) return networkErrorStatus(error);
  if (error === CraftErrorCode.INVALID_REQUEST) return HttpStatusCode.BAD_REQUEST;
  if (error === CraftErrorCode.PARTIAL_CRAFT_FAILURE) return HttpStatusCode.CONFLICT;
  return HttpStatusCode.UNPROCESSABLE_ENTITY;
}

export function serializeNetwork(network: StorageNetworkResult): Record<string, unknown> {
  return {
    hasRoot: network.hasRoot,
    rootPosition: network.rootPosition,
    unitPositions: network.unitPositions,
    unitCount: network.unitCount,
    nodeCount: network.nodeCount,
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
