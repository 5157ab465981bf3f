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

import { oneOf, type Type } from "cmd-ts";
import { VirtualAddress } from "../address/VirtualAddress.js";
import { ColorOptions, type ColorOption } from "../output/AnsiStyles.js";
import { ArchitectureFamilies, type ArchitectureFamily } from "../paging/Architecture.js";

export const VirtualAddressArg: Type<string, VirtualAddress> = {
    async from(input) {
        return VirtualAddress.parse(input);
    },
    displayName: "address",
    description: "Virtual address in hexadecimal, e.g. 0x123 or 0x1234_5678. Needs the 0x prefix.",
};

export const ArchitectureArg: Type<string, ArchitectureFamily> = {
    ...oneOf([...ArchitectureFamilies]),
    displayName: "architecture",
};

export const ColorArg: Type<string, ColorOption> = {
    ...oneOf([...ColorOptions]),
    displayName: "when",
};
