export type Address = string;

export type BatchStatus =
    | "pending" | "settling" | "settled" | "failed";

export type TokenMetadata = {
    initialized: boolean;
    decimals: number;
    discountTier: number;
};

export type MetadataOutcome = "resolved" | "defaulted" | "cached";

export type MetadataResolution = {
    outcome: MetadataOutcome;
    metadata: TokenMetadata;
};

export type PricePacket = {
    request: string;        // bytes32 request-type id
    deadline: bigint;       // unix seconds, inclusive
    payload: string;        // abi-encoded (address[] tokens, uint256[] prices)
    signature: string;
};

// token address -> native wei per one whole token
export type TrustedPrices = Map<Address, bigint>;

export type VerifiedPacket = {
    prices: TrustedPrices;
    digest: string;
    signer: Address;
};

export type SweeperConfigSnapshot = {
    readonly engineAddress: Address;
    readonly priceRequestType: string;
    readonly protocolFeeBps: number;
    readonly payoutSplitBps: number;
    readonly protocolWallet: Address;
    readonly partnerWallet: Address;
    readonly tierDiscounts: ReadonlyMap<number, number>;
    readonly trustedSigners: ReadonlySet<Address>;
    readonly whitelistEnabled: boolean;
    readonly whitelist: ReadonlySet<Address>;
    readonly maxBatchSize: number;
    readonly overageDustThreshold: bigint;
};

export type CallContext = {
    caller: Address;
    value: bigint;
    timestamp: bigint;
};

export type OrderLeg = {
    maker: Address;
    token: Address;
    tokenAmount: bigint;
    grossNativeValue: bigint;
    payableAmount: bigint;
    destination: Address;
};

export type SettlementRecord = OrderLeg & {
    discountTier: number;
};

export type SkipReason = "zero-allowance" | "zero-balance";

export type SkippedLeg = {
    maker: Address;
    token: Address;
    reason: SkipReason;
};

export type BatchSettlement = {
    records: SettlementRecord[];
    skipped: SkippedLeg[];
    totalGross: bigint;
    totalPaid: bigint;
    protocolCut: bigint;
    refunded: bigint;
    retained: bigint;
    metadata: Map<Address, MetadataOutcome>;
    packetDigest: string;
};

export type ProtocolPayout = {
    total: bigint;
    protocolWallet: Address;
    protocolAmount: bigint;
    partnerWallet: Address;
    partnerAmount: bigint;
};
