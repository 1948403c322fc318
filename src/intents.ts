import { AbiCoder, getAddress, id, keccak256, verifyMessage } from "ethers";
import { packetDigest } from "./packet.js";
import type { Address, PricePacket } from "./types.js";

const coder = AbiCoder.defaultAbiCoder();

export const destinationMessage = (maker: Address, destination: Address, nonce: bigint) =>
    `dust-sweeper:set-destination:${getAddress(maker)}:${getAddress(destination)}:${nonce}`;

/**
 * What a taker signs to submit a batch: who pays, how much, which legs and
 * under which price packet. Nothing in it depends on the batch id, so the
 * signature can be made before submission.
 */
export function settleMessage(
    caller: Address,
    value: bigint,
    makers: Address[],
    tokens: Address[],
    packet: PricePacket
): string {
    const legs = keccak256(coder.encode(["address[]", "address[]"], [makers.map((m) => getAddress(m)), tokens.map((t) => getAddress(t))]));
    const digest = packetDigest(packet.request, packet.deadline, packet.payload);
    return `dust-sweeper:settle:${getAddress(caller)}:${value}:${legs}:${digest}`;
}

export function signedBy(message: string, signature: string, expected: Address): boolean {
    try {
        return getAddress(verifyMessage(message, signature)) === getAddress(expected);
    } catch {
        return false;
    }
}

// Signed requests the HTTP layer has already acted on.
export class IntentRegistry {
    private destinationNonces = new Map<Address, bigint>();
    private settlements = new Set<string>();

    destinationNonce(maker: Address): bigint {
        return this.destinationNonces.get(getAddress(maker)) ?? 0n;
    }

    bumpDestinationNonce(maker: Address): void {
        const m = getAddress(maker);
        this.destinationNonces.set(m, this.destinationNonce(m) + 1n);
    }

    // false when the same settlement request was already accepted
    claimSettlement(message: string): boolean {
        const key = id(message);
        if (this.settlements.has(key)) return false;
        this.settlements.add(key);
        return true;
    }

    releaseSettlement(message: string): void {
        this.settlements.delete(id(message));
    }
}
