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

const Reset = "\x1b[0m";
const Bold = "\x1b[1m";
const BoldRed = "\x1b[1;31m";
const LightGray = "\x1b[37m";

export type ColorOption = "never" | "auto" | "always";

export const ColorOptions: readonly ColorOption[] = ["never", "auto", "always"];

/**
 * Decides whether ANSI escape sequences should be written.
 * "auto" uses them only when the output is a terminal.
 */
export function shouldUseAnsi(option: ColorOption, isTTY: boolean): boolean {
    switch (option) {
        case "never":   return false;
        case "auto":    return isTTY;
        case "always":  return true;
    }
}

export class AnsiStyles {
    private useAnsi: boolean;

    public constructor(useAnsi: boolean) {
        this.useAnsi = useAnsi;
    }

    public highlight(str: string): string {
        return this.paint(BoldRed, str);
    }

    public heading(str: string): string {
        return this.paint(Bold, str);
    }

    public hint(str: string): string {
        return this.paint(LightGray, str);
    }

    private paint(style: string, str: string): string {
        if (!this.useAnsi) {
            return str;
        }
        return style + str + Reset;
    }
}
