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

export type VirtualAddressErrorKind = "MissingPrefix" | "ParseInt";

export class VirtualAddressError extends Error {
    public kind: VirtualAddressErrorKind;
    public input: string;

    public constructor(kind: VirtualAddressErrorKind, input: string) {
        super(VirtualAddressError.describe(kind, input));
        this.name = VirtualAddressError.name;
        this.kind = kind;
        this.input = input;
    }

    private static describe(kind: VirtualAddressErrorKind, input: string): string {
        switch (kind) {
            case "MissingPrefix":   return `The virtual address must begin with the prefix 0x: '${input}'`;
            case "ParseInt":        return `The virtual address is not a hexadecimal 64-bit number: '${input}'`;
        }
    }
}
