export type SweeperErrorCode =
    | "CONFIGURATION"
    | "BAD_PACKET"
    | "NO_SWEEPABLE_ORDERS"
    | "NO_TOKEN_PRICE"
    | "INSUFFICIENT_NATIVE"
    | "ZERO_ADDRESS"
    | "NO_BALANCE"
    | "REENTRANCY";

export class SweeperError extends Error {
    constructor(readonly code: SweeperErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ConfigurationError extends SweeperError {
    constructor(readonly field: string, message: string) {
        super("CONFIGURATION", `${field}: ${message}`);
    }
}

export type BadPacketReason =
    | "wrong-request"
    | "expired"
    | "untrusted-signer"
    | "bad-signature"
    | "bad-payload"
    | "replayed";

export class BadPacketError extends SweeperError {
    constructor(readonly reason: BadPacketReason) {
        super("BAD_PACKET", `price packet rejected: ${reason}`);
    }
}

export class NoSweepableOrdersError extends SweeperError {
    constructor(readonly detail: string) {
        super("NO_SWEEPABLE_ORDERS", `no sweepable orders: ${detail}`);
    }
}

export class NoTokenPriceError extends SweeperError {
    constructor(readonly token: string) {
        super("NO_TOKEN_PRICE", `no trusted price for token ${token}`);
    }
}

export class InsufficientNativeError extends SweeperError {
    constructor(readonly required: bigint, readonly available: bigint) {
        super(
            "INSUFFICIENT_NATIVE",
            `insufficient native value: required ${required}, available ${available}`
        );
    }
}

export class ZeroAddressError extends SweeperError {
    constructor(field: string) {
        super("ZERO_ADDRESS", `${field} must not be the zero address`);
    }
}

export class NoBalanceError extends SweeperError {
    constructor() {
        super("NO_BALANCE", "no retained balance to pay out");
    }
}

export class ReentrancyError extends SweeperError {
    constructor(entry: string) {
        super("REENTRANCY", `re-entrant call into ${entry}`);
    }
}
