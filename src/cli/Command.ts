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

import { command, flag, option, optional, positional } from "cmd-ts";
import { PagingImplInfo } from "../paging/PagingImplInfo.js";
import { Version } from "../version.js";
import { ArchitectureArg, ColorArg, VirtualAddressArg } from "./ArgTypes.js";
import { runCli, type CliIO } from "./Cli.js";

export function describeSupportedModes(): string {
    const modes = PagingImplInfo.all().map(info => `${info.name} (${info.levels} levels)`);
    return "Supported paging modes: " + modes.join(", ");
}

/**
 * The command line of the calculator. The handler returns the exit code
 * instead of exiting so that the caller decides what to do with it.
 */
export function createCommand(io: CliIO) {
    return command({
        name: "paging-calculator",
        version: Version,
        description: "Calculates the indices into the page tables of x86 and x86_64 for a virtual address. "
            + describeSupportedModes(),
        args: {
            address: positional({
                type: VirtualAddressArg,
                displayName: "address",
            }),
            architecture: positional({
                type: ArchitectureArg,
                displayName: "architecture",
                description: "Paging implementation: x86 (2-level) or x86_64 (4-level)",
            }),
            pae: flag({
                long: "pae",
                description: "x86 only: Physical Address Extension, adds a third level",
            }),
            fiveLevel: flag({
                long: "five-level",
                short: "5",
                description: "x86_64 only: 5-level paging, adds a fifth level",
            }),
            color: option({
                long: "color",
                description: "Use ANSI escape sequences: never, auto (when stdout is a terminal) or always",
                type: optional(ColorArg),
            }),
        },

        handler: (args) => runCli(args, io),
    });
}
