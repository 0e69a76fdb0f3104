export type TunnelErrorCode =
  | "conflict"
  | "not_found"
  | "capacity_exceeded"
  | "address_space_exhausted"
  | "provisioning_failed"
  | "backend_unreachable";

/**
 * Base class for every failure the routing and tunnel subsystem reports.
 *
 * `status` is the HTTP status the management API answers with.
 */
export class TunnelError extends Error {
  readonly code: TunnelErrorCode;
  readonly status: number;

  constructor(code: TunnelErrorCode, message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TunnelError";
    this.code = code;
    this.status = status;
  }
}

/** duplicate hostname, port or tunnel identifier */
export class ConflictError extends TunnelError {
  constructor(message: string) {
    super("conflict", message, 409);
    this.name = "ConflictError";
  }
}

/** unknown tunnel identifier, hostname or port */
export class NotFoundError extends TunnelError {
  constructor(message: string) {
    super("not_found", message, 404);
    this.name = "NotFoundError";
  }
}

export class CapacityExceededError extends TunnelError {
  readonly limit: number;

  constructor(limit: number) {
    super("capacity_exceeded", `maximum number of tunnels (${limit}) reached`, 429);
    this.name = "CapacityExceededError";
    this.limit = limit;
  }
}

export class AddressSpaceExhaustedError extends TunnelError {
  constructor(block: string) {
    super("address_space_exhausted", `no free peer address left in ${block}`, 507);
    this.name = "AddressSpaceExhaustedError";
  }
}

/** peer key generation or interface setup failure */
export class ProvisioningError extends TunnelError {
  constructor(message: string, cause?: unknown) {
    super("provisioning_failed", message, 502, cause === undefined ? undefined : { cause });
    this.name = "ProvisioningError";
  }
}

export class BackendUnreachableError extends TunnelError {
  readonly tunnelId: string;

  constructor(tunnelId: string, address: string, cause?: unknown) {
    super(
      "backend_unreachable",
      `backend ${address} for tunnel ${tunnelId} is unreachable`,
      502,
      cause === undefined ? undefined : { cause },
    );
    this.name = "BackendUnreachableError";
    this.tunnelId = tunnelId;
  }
}

export function isTunnelError(value: unknown): value is TunnelError {
  return value instanceof TunnelError;
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
