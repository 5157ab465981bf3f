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

import { isU64, numToHex, U32Max } from "../utils/Bits.js";
import { VirtualAddressError } from "./VirtualAddressError.js";

/**
 * A 64-bit virtual address. On the command line it is given in hexadecimal
 * as `0x123` or `0x1234_5678`; the `0x` prefix is required. Paging modes
 * with 32-bit addresses only look at the low 32 bits.
 */
export class VirtualAddress {
    public static readonly Prefix = "0x";

    private readonly value: bigint;

    public constructor(value: bigint | number) {
        const big = BigInt(value);
        if (!isU64(big)) {
            throw new RangeError(`Virtual address out of 64-bit range: ${big}`);
        }
        this.value = big;
    }

    public static parse(input: string): VirtualAddress {
        // underscores group digits and are ignored, like surrounding blanks
        const str = input.trim().toLowerCase().replaceAll("_", "");

        if (!str.startsWith(VirtualAddress.Prefix)) {
            throw new VirtualAddressError("MissingPrefix", input);
        }

        const digits = str.substring(VirtualAddress.Prefix.length);
        if (!digits.match(/^[0-9a-f]+$/)) {
            throw new VirtualAddressError("ParseInt", input);
        }

        const value = BigInt(VirtualAddress.Prefix + digits);
        if (!isU64(value)) {
            throw new VirtualAddressError("ParseInt", input);
        }

        return new VirtualAddress(value);
    }

    public toBigInt(): bigint {
        return this.value;
    }

    public truncated32(): bigint {
        return this.value & U32Max;
    }

    public equals(other: VirtualAddress): boolean {
        return this.value == other.value;
    }

    public toString(): string {
        return VirtualAddress.Prefix + numToHex(this.value, 16);
    }
}
