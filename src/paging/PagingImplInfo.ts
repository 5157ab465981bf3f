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
import { AddrWidth } from "./AddrWidth.js";
import type { Architecture } from "./Architecture.js";
import { calculatePageTableIndex, type PageTableLookupMetaInfo } from "./PageTableIndex.js";

export interface PagingImplDescriptor {
    name: string;
    description: string;
    addrWidth: AddrWidth;

    /** Bits that index into the page, the page size is 2^pageOffsetBits. */
    pageOffsetBits: number;

    /**
     * Bits that index into a page table, a table has 2^pageTableIndexBits entries.
     * Assumed to be the same on all levels.
     */
    pageTableIndexBits: number;

    /** In bytes. */
    pageTableEntrySize: number;

    levels: number;
}

/**
 * Characteristics of one paging implementation. The supported ones are
 * the static members, selected with {@link PagingImplInfo.fromArch}.
 */
export class PagingImplInfo implements Readonly<PagingImplDescriptor> {
    public static readonly X86 = new PagingImplInfo({
        name: "x86 32-bit paging",
        levels: 2,
        description: [
            "x86 paging uses a 2-level page table. The page offset takes 12 bits,",
            "so a page has 4096 bytes. Each page table is indexed by 10 bits and holds",
            "2^10 == 1024 entries of 32 bits each, so a table fills exactly one page.",
            "Huge pages have a size of 2^22 == 4 MiB and are valid on level 2.",
        ].join("\n"),
        addrWidth: AddrWidth.Bits32,
        pageOffsetBits: 12,
        pageTableIndexBits: 10,
        pageTableEntrySize: 4,
    });

    public static readonly X86_PAE = new PagingImplInfo({
        name: "x86 32-bit paging with PAE",
        levels: 3,
        description: [
            "x86 paging with Physical Address Extension (PAE) uses a 3-level page table",
            "to reach more than 32 bits of physical address space. The page offset takes",
            "12 bits, so a page has 4096 bytes. The tables on levels 1 and 2 are indexed",
            "by 9 bits and hold 2^9 == 512 entries. The level 3 table is indexed by the",
            "remaining 2 bits and holds 2^2 == 4 entries. Entries are 64 bits each, so",
            "tables on levels 1 and 2 fill one page and the level 3 table takes 32 bytes.",
            "Huge pages have a size of 2^21 == 2 MiB and are valid on level 2.",
        ].join("\n"),
        addrWidth: AddrWidth.Bits32,
        pageOffsetBits: 12,
        pageTableIndexBits: 9,
        pageTableEntrySize: 8,
    });

    public static readonly X86_64 = new PagingImplInfo({
        name: "x86_64 paging",
        levels: 4,
        description: [
            "x86_64 paging uses a 4-level page table. The page offset takes 12 bits,",
            "so a page has 4096 bytes. Each page table is indexed by 9 bits and holds",
            "2^9 == 512 entries of 64 bits each, so a table fills exactly one page.",
            "Huge pages have a size of 2^21 == 2 MiB or 2^30 == 1 GiB and are valid",
            "on levels 2 and 3.",
        ].join("\n"),
        addrWidth: AddrWidth.Bits64,
        pageOffsetBits: 12,
        pageTableIndexBits: 9,
        pageTableEntrySize: 8,
    });

    public static readonly X86_64_5LEVEL = new PagingImplInfo({
        name: "x86_64 paging (5-level)",
        levels: 5,
        description: [
            "x86_64 paging optionally uses a 5-level page table. The page offset takes",
            "12 bits, so a page has 4096 bytes. Each page table is indexed by 9 bits and",
            "holds 2^9 == 512 entries of 64 bits each, so a table fills exactly one page.",
            "Huge pages have a size of 2^21 == 2 MiB or 2^30 == 1 GiB and are valid",
            "on levels 2 and 3.",
        ].join("\n"),
        addrWidth: AddrWidth.Bits64,
        pageOffsetBits: 12,
        pageTableIndexBits: 9,
        pageTableEntrySize: 8,
    });

    public readonly name: string;
    public readonly description: string;
    public readonly addrWidth: AddrWidth;
    public readonly pageOffsetBits: number;
    public readonly pageTableIndexBits: number;
    public readonly pageTableEntrySize: number;
    public readonly levels: number;

    private constructor(desc: PagingImplDescriptor) {
        this.name = desc.name;
        this.description = desc.description;
        this.addrWidth = desc.addrWidth;
        this.pageOffsetBits = desc.pageOffsetBits;
        this.pageTableIndexBits = desc.pageTableIndexBits;
        this.pageTableEntrySize = desc.pageTableEntrySize;
        this.levels = desc.levels;
        Object.freeze(this);
    }

    public static all(): readonly PagingImplInfo[] {
        return [PagingImplInfo.X86, PagingImplInfo.X86_PAE, PagingImplInfo.X86_64, PagingImplInfo.X86_64_5LEVEL];
    }

    public static fromArch(arch: Architecture): PagingImplInfo {
        switch (arch.family) {
            case "x86":     return arch.pae ? PagingImplInfo.X86_PAE : PagingImplInfo.X86;
            case "x86_64":  return arch.fiveLevel ? PagingImplInfo.X86_64_5LEVEL : PagingImplInfo.X86_64;
        }
    }

    /**
     * Lookup info for every level of this paging implementation.
     * Element 0 is level 1, the last element is the highest level.
     */
    public calcPageTableLookupMetaInfo(vAddr: VirtualAddress): PageTableLookupMetaInfo[] {
        const infos: PageTableLookupMetaInfo[] = [];
        for (let level = 1; level <= this.levels; level++) {
            infos.push(calculatePageTableIndex(
                this.pageTableIndexBits,
                this.pageOffsetBits,
                vAddr,
                level,
                this.addrWidth,
            ));
        }
        return infos;
    }
}
