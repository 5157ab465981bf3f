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

import { PreconditionError } from "./PreconditionError.js";

export const U32Max = 0xFFFF_FFFFn;
export const U64Max = 0xFFFF_FFFF_FFFF_FFFFn;

/**
 * Creates a mask with the given number of ones, filled in from the right side.
 * The ones are set one at a time so that 64 yields all-ones instead of relying
 * on a shift by the full width.
 */
export function createMask(bits: number): bigint {
    if (!Number.isInteger(bits) || bits < 0 || bits > 64) {
        throw new PreconditionError("bits", bits, "must be an integer in 0..=64");
    }

    let mask = 0n;
    for (let i = 0; i < bits; i++) {
        mask = (mask << 1n) | 1n;
    }
    return mask;
}

export function isU64(value: bigint): boolean {
    return value >= 0n && value <= U64Max;
}

export function numToBinary(num: bigint, width: number): string {
    return num.toString(2).padStart(width, "0");
}

export function numToHex(num: bigint, width: number): string {
    return num.toString(16).padStart(width, "0");
}
