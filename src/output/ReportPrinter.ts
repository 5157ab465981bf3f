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

import type { VirtualAddress } from "../address/VirtualAddress.js";
import { AddrWidth, addrWidthBits } from "../paging/AddrWidth.js";
import type { PageTableLookupMetaInfo } from "../paging/PageTableIndex.js";
import type { PagingImplInfo } from "../paging/PagingImplInfo.js";
import { numToBinary, numToHex } from "../utils/Bits.js";
import { Version } from "../version.js";
import { AnsiStyles } from "./AnsiStyles.js";

export interface ReportOptions {
    useAnsi: boolean;
}

export function printReport(
    info: PagingImplInfo,
    lookups: readonly PageTableLookupMetaInfo[],
    vAddr: VirtualAddress,
    opts: ReportOptions,
    write: (line: string) => void,
) {
    const styles = new AnsiStyles(opts.useAnsi);

    printHeader(info, vAddr, styles, write);

    const highestFirst = [...lookups].reverse();

    for (const lookup of highestFirst) {
        write(`level ${lookup.level} bits  : ${formatRelevantBits(lookup, info, styles)}`);
    }

    highestFirst.forEach((lookup, i) => {
        const isFirst = i == 0;

        let indexLine = `level ${lookup.level} entry index : ${lookup.index.toString().padStart(6)}`;
        if (isFirst) {
            indexLine += "  " + styles.hint("(number of entry)");
        }
        write(indexLine);

        const offset = lookup.index * BigInt(info.pageTableEntrySize);
        let offsetLine = `level ${lookup.level} entry offset: 0x${numToHex(offset, 4)}`;
        if (isFirst) {
            offsetLine += "  " + styles.hint("(offset into the page table for that entry)");
        }
        write(offsetLine);
    });
}

function printHeader(info: PagingImplInfo, vAddr: VirtualAddress, styles: AnsiStyles, write: (line: string) => void) {
    write(styles.heading(`Page Table Calculator (v${Version}): ${info.name}`));
    write("");
    info.description.split("\n").forEach(line => write(line));
    write("");

    if (info.addrWidth == AddrWidth.Bits32) {
        const addr = vAddr.truncated32();
        write(`address       : 0x${addr.toString(16)}  ${styles.hint("(user input truncated to 32-bit)")}`);
        write(`address (bits): 0b${numToBinary(addr, 32)}`);
    } else {
        write(`address       : ${vAddr}`);
        write(`address (bits): 0b${numToBinary(vAddr.toBigInt(), 64)}`);
    }
}

/**
 * The address bits of one level with its index field highlighted and
 * every other bit shown as zero. The field of the highest level may be
 * clipped by the address width, as with the 2-bit top level under PAE.
 */
export function formatRelevantBits(lookup: PageTableLookupMetaInfo, info: PagingImplInfo, styles: AnsiStyles): string {
    const width = addrWidthBits(info.addrWidth);
    const rightZeros = info.pageOffsetBits + (lookup.level - 1) * info.pageTableIndexBits;

    let fieldBits = info.pageTableIndexBits;
    if (rightZeros + fieldBits > width) {
        fieldBits = Math.max(width - rightZeros, 0);
    }

    const leftZeros = Math.max(width - rightZeros - fieldBits, 0);
    const field = fieldBits > 0 ? numToBinary(lookup.index, fieldBits) : "";

    return "0b" + "0".repeat(leftZeros) + styles.highlight(field) + "0".repeat(rightZeros);
}
