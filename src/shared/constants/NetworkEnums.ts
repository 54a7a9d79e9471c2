/**
 * Storage network enumerations.
 *
 * @module shared/constants/NetworkEnums
 */

/**
 * Role of a tile inside a storage network.
 * Roots aggregate, units hold items, components and connectors only propagate
 * connectivity, access tiles are entry points without storage of their own.
 */
export enum NetworkNodeKind {
  ROOT = "root",
  UNIT = "unit",
  COMPONENT = "component",
  CONNECTOR = "connector",
  ACCESS = "access",
}

export enum NetworkErrorCode {
  NETWORK_NOT_FOUND = "NetworkNotFound",
  NO_ROOT_CONNECTED = "NoRootConnected",
  NETWORK_TOO_LARGE = "NetworkTooLarge",
}
