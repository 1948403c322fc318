import { AbiCoder, getAddress, getBytes, isHexString, keccak256, verifyMessage, type Signer } from "ethers";
import { BadPacketError } from "./errors.js";
import type { Address, PricePacket, TrustedPrices, VerifiedPacket } from "./types.js";

const coder = AbiCoder.defaultAbiCoder();

export type VerifyOptions = {
    expectedRequest: string;
    trustedSigners: ReadonlySet<Address>;
    now: bigint;
};

export function encodePricePayload(prices: Array<{ token: Address; price: bigint }>): string {
    return coder.encode(
        ["address[]", "uint256[]"],
        [prices.map((p) => p.token), prices.map((p) => p.price)]
    );
}

export function packetDigest(request: string, deadline: bigint, payload: string): string {
    return keccak256(coder.encode(["bytes32", "uint256", "bytes"], [request, deadline, payload]));
}

export async function signPricePacket(
    signer: Signer,
    request: string,
    deadline: bigint,
    prices: Array<{ token: Address; price: bigint }>
): Promise<PricePacket> {
    const payload = encodePricePayload(prices);
    const signature = await signer.signMessage(getBytes(packetDigest(request, deadline, payload)));
    return { request, deadline, payload, signature };
}

export function decodePricePayload(payload: string): TrustedPrices {
    let decoded: unknown[];
    try {
        decoded = [...coder.decode(["address[]", "uint256[]"], payload)];
    } catch {
        throw new BadPacketError("bad-payload");
    }

    const [tokens, prices] = decoded;
    if (!Array.isArray(tokens) || !Array.isArray(prices) || tokens.length !== prices.length) {
        throw new BadPacketError("bad-payload");
    }

    const out: TrustedPrices = new Map();
    tokens.forEach((token: unknown, i) => {
        const price: unknown = prices[i];
        if (typeof token !== "string" || typeof price !== "bigint") {
            throw new BadPacketError("bad-payload");
        }
        const key = getAddress(token);
        // first entry wins
        if (!out.has(key)) out.set(key, price);
    });
    return out;
}

/**
 * Checks request type, deadline and signer, in that order, and only then
 * releases the payload. Nothing outside this function reads packet prices.
 */
export function verifyPricePacket(packet: PricePacket, opts: VerifyOptions): VerifiedPacket {
    if (!isHexString(packet.request, 32) || packet.request.toLowerCase() !== opts.expectedRequest.toLowerCase()) {
        throw new BadPacketError("wrong-request");
    }
    if (opts.now > packet.deadline) {
        throw new BadPacketError("expired");
    }
    if (!isHexString(packet.payload)) {
        throw new BadPacketError("bad-payload");
    }

    const digest = packetDigest(packet.request, packet.deadline, packet.payload);
    let signer: Address;
    try {
        signer = getAddress(verifyMessage(getBytes(digest), packet.signature));
    } catch {
        throw new BadPacketError("bad-signature");
    }
    if (!opts.trustedSigners.has(signer)) {
        throw new BadPacketError("untrusted-signer");
    }

    return { prices: decodePricePayload(packet.payload), digest, signer };
}
