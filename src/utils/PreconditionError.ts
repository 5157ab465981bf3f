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

/**
 * Raised when the paging arithmetic is called with parameters that can only come
 * from a broken catalog entry or a broken caller, never from user input.
 */
export class PreconditionError extends Error {
    public parameter: string;
    public value: number | bigint;

    public constructor(parameter: string, value: number | bigint, requirement: string) {
        super(`Precondition violated: ${parameter} ${requirement}, got ${value}`);
        this.name = PreconditionError.name;
        this.parameter = parameter;
        this.value = value;
    }
}
