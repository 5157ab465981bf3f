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
import { shouldUseAnsi, type ColorOption } from "../output/AnsiStyles.js";
import { PagingCalculator } from "../PagingCalculator.js";
import type { Architecture, ArchitectureFamily } from "../paging/Architecture.js";
import { ArchitectureError } from "./ArchitectureError.js";

export interface CliArgs {
    address: VirtualAddress;
    architecture: ArchitectureFamily;
    pae: boolean;
    fiveLevel: boolean;
    color?: ColorOption;
}

export interface CliIO {
    log: (line: string) => void;
    error: (line: string) => void;
    isTTY: boolean;
}

export function resolveArchitecture(family: ArchitectureFamily, pae: boolean, fiveLevel: boolean): Architecture {
    switch (family) {
        case "x86":
            if (fiveLevel) {
                throw new ArchitectureError("--five-level is only available for x86_64");
            }
            return { family, pae };
        case "x86_64":
            if (pae) {
                throw new ArchitectureError("--pae is only available for x86");
            }
            return { family, fiveLevel };
    }
}

/**
 * Prints the report for the given arguments and returns the process exit code.
 */
export function runCli(args: CliArgs, io: CliIO): number {
    let architecture: Architecture;
    try {
        architecture = resolveArchitecture(args.architecture, args.pae, args.fiveLevel);
    } catch (e) {
        if (e instanceof ArchitectureError) {
            io.error(e.message);
            return 1;
        }
        throw e;
    }

    const useAnsi = shouldUseAnsi(args.color ?? "auto", io.isTTY);
    const calc = new PagingCalculator({ architecture });
    calc.print(args.address, { useAnsi }, io.log);
    return 0;
}
