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

import type { VirtualAddress } from "./address/VirtualAddress.js";
import { printReport, type ReportOptions } from "./output/ReportPrinter.js";
import type { Architecture } from "./paging/Architecture.js";
import type { PageTableLookupMetaInfo } from "./paging/PageTableIndex.js";
import { PagingImplInfo } from "./paging/PagingImplInfo.js";

export interface PagingCalculatorOptions {
    architecture: Architecture;
}

export interface PagingCalculatorOutput {
    info: PagingImplInfo;
    lookups: ReadonlyArray<PageTableLookupMetaInfo>;
}

export class PagingCalculator {
    private info: PagingImplInfo;

    public constructor(opts: PagingCalculatorOptions) {
        this.info = PagingImplInfo.fromArch(opts.architecture);
    }

    public calculate(vAddr: VirtualAddress): PagingCalculatorOutput {
        const lookups = this.info.calcPageTableLookupMetaInfo(vAddr);
        return { info: this.info, lookups };
    }

    public print(vAddr: VirtualAddress, opts: ReportOptions, write: (line: string) => void) {
        const output = this.calculate(vAddr);
        printReport(output.info, output.lookups, vAddr, opts, write);
    }
}
