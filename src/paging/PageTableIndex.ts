/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { VirtualAddress } from "../address/VirtualAddress.js";
import { createMask, U64Max } from "../utils/Bits.js";
import { PreconditionError } from "../utils/PreconditionError.js";
import { AddrWidth } from "./AddrWidth.js";

/**
 * What is needed to look up one page-table level for a virtual address,
 * without performing the lookup itself.
 */
export interface PageTableLookupMetaInfo {
    /** Address the info was calculated for, before any truncation. */
    readonly vAddr: VirtualAddress;

    /** 1 is the table nearest to the page, the highest level is the root. */
    readonly level: number;

    /** Entry number in the table, not its byte offset. */
    readonly index: bigint;

    /** Right shift that moves the index bits of this level to the lowest position. */
    readonly shift: number;

    /** The address with all bits outside this level's index field cleared. */
    readonly relevantPartOfAddr: bigint;
}

function requirePositive(parameter: string, value: number) {
    if (!Number.isInteger(value) || value <= 0) {
        throw new PreconditionError(parameter, value, "must be a positive integer");
    }
}

/**
 * Calculates the index into the page table of the given level.
 *
 * @param indexBits bits that index into each page table, e.g. 10 on x86 and 9 with PAE or on x86_64
 * @param pageOffsetBits bits that index into the page, e.g. 12 for 4 KiB pages
 * @param level page-table level, starting at 1. Level 0 would be the page itself.
 */
export function calculatePageTableIndex(
    indexBits: number,
    pageOffsetBits: number,
    vAddr: VirtualAddress | bigint,
    level: number,
    addrWidth: AddrWidth,
): PageTableLookupMetaInfo {
    requirePositive("indexBits", indexBits);
    requirePositive("pageOffsetBits", pageOffsetBits);
    requirePositive("level", level);
    if (indexBits > 64) {
        throw new PreconditionError("indexBits", indexBits, "must not exceed 64");
    }

    const addrObj = vAddr instanceof VirtualAddress ? vAddr : new VirtualAddress(vAddr);
    const addr = addrWidth == AddrWidth.Bits32 ? addrObj.truncated32() : addrObj.toBigInt();

    const shift = indexBits * (level - 1) + pageOffsetBits;
    const mask = createMask(indexBits);

    // a field starting at bit 64 or above selects nothing
    if (shift >= 64) {
        return { vAddr: addrObj, level, index: 0n, shift, relevantPartOfAddr: 0n };
    }

    const index = (addr >> BigInt(shift)) & mask;
    // the shifted mask may reach beyond bit 63, keep it within 64 bits
    const relevantPartOfAddr = addr & ((mask << BigInt(shift)) & U64Max);

    return {
        vAddr: addrObj,
        level,
        index,
        shift,
        relevantPartOfAddr,
    };
}
