import { getAddress } from "ethers";
import type { ApprovalEvent } from "./ledger.js";
import type { Address } from "./types.js";

export type PendingApprovals = {
    makers: Address[];
    tokens: Address[];
    events: ApprovalEvent[];
};

export function scanApprovals(events: ApprovalEvent[], spender: Address): PendingApprovals {
    const target = getAddress(spender);

    // newest first
    const sorted = events
        .filter((e) => getAddress(e.spender) === target)
        .sort((a, b) =>
            a.blockNumber === b.blockNumber ? b.logIndex - a.logIndex : b.blockNumber - a.blockNumber
        );

    // the newest approval per (maker, token) is the live one
    const seen = new Set<string>();
    const live: ApprovalEvent[] = [];
    for (const e of sorted) {
        const key = `${getAddress(e.owner)}:${getAddress(e.token)}`;
        if (seen.has(key)) continue;
        seen.add(key);
        if (e.value > 0n) live.push(e);
    }

    return {
        makers: live.map((e) => getAddress(e.owner)),
        tokens: live.map((e) => getAddress(e.token)),
        events: live,
    };
}
