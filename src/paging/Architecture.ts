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

export type ArchitectureFamily = "x86" | "x86_64";

export const ArchitectureFamilies: readonly ArchitectureFamily[] = ["x86", "x86_64"];

/**
 * A paging mode: the architecture family and its one optional feature,
 * Physical Address Extension on x86 or 5-level paging on x86_64.
 */
export type Architecture =
    { family: "x86"; pae: boolean } |
    { family: "x86_64"; fiveLevel: boolean };
