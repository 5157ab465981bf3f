import { VirtualAddress } from "../../../src/address/VirtualAddress.js";
import { AddrWidth } from "../../../src/paging/AddrWidth.js";
import { calculatePageTableIndex } from "../../../src/paging/PageTableIndex.js";
import { U64Max } from "../../../src/utils/Bits.js";
import { PreconditionError } from "../../../src/utils/PreconditionError.js";

describe("GIVEN a 32-bit address split along the x86 page-table levels", () => {
    const addr = 0b1111111111_1010101010_001111000011n;

    test("THEN level 2 should index the top 10 bits", () => {
        const info = calculatePageTableIndex(10, 12, addr, 2, AddrWidth.Bits32);
        expect(info.index).toEqual(0b1111111111n);
        expect(info.relevantPartOfAddr).toEqual(0b1111111111n << 22n);
        expect(info.shift).toEqual(22);
        expect(info.level).toEqual(2);
    });

    test("THEN level 1 should index the 10 bits above the page offset", () => {
        const info = calculatePageTableIndex(10, 12, addr, 1, AddrWidth.Bits32);
        expect(info.index).toEqual(0b1010101010n);
        expect(info.relevantPartOfAddr).toEqual(0b1010101010n << 12n);
        expect(info.shift).toEqual(12);
    });
});

describe("GIVEN a 32-bit address split along the x86 PAE page-table levels", () => {
    const addr = 0b10_111111111_010101010_001111000011n;

    test("THEN level 3 should index the remaining 2 bits", () => {
        const info = calculatePageTableIndex(9, 12, addr, 3, AddrWidth.Bits32);
        expect(info.index).toEqual(0b10n);
        expect(info.relevantPartOfAddr).toEqual(0b10n << 30n);
    });

    test("THEN level 2 should index the middle 9 bits", () => {
        const info = calculatePageTableIndex(9, 12, addr, 2, AddrWidth.Bits32);
        expect(info.index).toEqual(0b111111111n);
        expect(info.relevantPartOfAddr).toEqual(0b111111111n << 21n);
    });

    test("THEN level 1 should index the low 9 bits", () => {
        const info = calculatePageTableIndex(9, 12, addr, 1, AddrWidth.Bits32);
        expect(info.index).toEqual(0b010101010n);
        expect(info.relevantPartOfAddr).toEqual(0b010101010n << 12n);
    });
});

describe("GIVEN a 64-bit address split along the x86_64 page-table levels", () => {
    const addr = new VirtualAddress(0b000100000_000011111_111111111_010101010_001111000011n);
    const expectations: [number, bigint][] = [
        [4, 0b000100000n],
        [3, 0b000011111n],
        [2, 0b111111111n],
        [1, 0b010101010n],
    ];

    for (const [level, index] of expectations) {
        test(`THEN level ${level} should have index 0b${index.toString(2)}`, () => {
            const info = calculatePageTableIndex(9, 12, addr, level, AddrWidth.Bits64);
            expect(info.index).toEqual(index);
            expect(info.relevantPartOfAddr).toEqual(index << BigInt(9 * (level - 1) + 12));
            expect(info.vAddr).toBe(addr);
        });
    }
});

describe("WHEN the address width is 32 bits", () => {
    const low = 0x1234_5678n;
    const noisy = 0xdead_beef_0000_0000n | low;

    test("THEN the upper 32 bits of the address should not matter", () => {
        for (let level = 1; level <= 3; level++) {
            const a = calculatePageTableIndex(9, 12, low, level, AddrWidth.Bits32);
            const b = calculatePageTableIndex(9, 12, noisy, level, AddrWidth.Bits32);
            expect(b.index).toEqual(a.index);
            expect(b.relevantPartOfAddr).toEqual(a.relevantPartOfAddr);
            expect(b.shift).toEqual(a.shift);
        }
    });

    test("THEN the untruncated address should still be reported", () => {
        const info = calculatePageTableIndex(9, 12, noisy, 1, AddrWidth.Bits32);
        expect(info.vAddr.toBigInt()).toEqual(noisy);
    });

    test("THEN a 64-bit width should see the upper bits", () => {
        const info = calculatePageTableIndex(9, 12, noisy, 4, AddrWidth.Bits64);
        expect(info.index).toEqual((noisy >> 39n) & 0x1FFn);
        expect(info.index).not.toEqual(0n);
    });
});

describe("WHEN a level reaches beyond bit 63", () => {
    test("THEN the relevant bits should be clipped to 64 bits", () => {
        // level 6 covers bits 57..65
        const info = calculatePageTableIndex(9, 12, U64Max, 6, AddrWidth.Bits64);
        expect(info.shift).toEqual(57);
        expect(info.index).toEqual(0x7Fn);
        expect(info.relevantPartOfAddr).toEqual(0x7Fn << 57n);
    });

    test("THEN a field starting at bit 64 should select nothing", () => {
        const info = calculatePageTableIndex(9, 10, U64Max, 7, AddrWidth.Bits64);
        expect(info.shift).toEqual(64);
        expect(info.index).toEqual(0n);
        expect(info.relevantPartOfAddr).toEqual(0n);
    });

    test("THEN a huge level should yield an empty field instead of failing", () => {
        const level = 2 ** 31;
        const info = calculatePageTableIndex(9, 12, 0xdeadbeefn, level, AddrWidth.Bits64);
        expect(info.shift).toEqual(9 * (level - 1) + 12);
        expect(info.level).toEqual(level);
        expect(info.index).toEqual(0n);
        expect(info.relevantPartOfAddr).toEqual(0n);
    });

    test("THEN an index field of 64 bits should use a full mask", () => {
        const info = calculatePageTableIndex(64, 1, U64Max, 1, AddrWidth.Bits64);
        expect(info.shift).toEqual(1);
        expect(info.index).toEqual(U64Max >> 1n);
        expect(info.relevantPartOfAddr).toEqual(U64Max - 1n);
    });
});

describe("WHEN calculating many indices", () => {
    // deterministic 64-bit LCG
    let state = 0x0123_4567_89AB_CDEFn;
    const nextAddr = () => {
        state = (state * 6364136223846793005n + 1442695040888963407n) & U64Max;
        return state;
    };

    const configs: [number, number, AddrWidth][] = [
        [10, 12, AddrWidth.Bits32],
        [9, 12, AddrWidth.Bits32],
        [9, 12, AddrWidth.Bits64],
        [4, 3, AddrWidth.Bits64],
        [1, 1, AddrWidth.Bits64],
    ];

    for (const [indexBits, offsetBits, width] of configs) {
        test(`THEN ${indexBits} index bits over ${offsetBits} offset bits should satisfy the index invariants`, () => {
            const widthBits = width == AddrWidth.Bits32 ? 32 : 64;
            for (let i = 0; i < 50; i++) {
                const addr = nextAddr();
                for (let level = 1; indexBits * (level - 1) + offsetBits + indexBits <= widthBits; level++) {
                    const info = calculatePageTableIndex(indexBits, offsetBits, addr, level, width);
                    expect(info.shift).toEqual(indexBits * (level - 1) + offsetBits);
                    expect(info.index >= 0n).toBe(true);
                    expect(info.index < 2n ** BigInt(indexBits)).toBe(true);
                    expect(info.relevantPartOfAddr).toEqual(info.index << BigInt(info.shift));
                }
            }
        });
    }
});

describe("WHEN the preconditions are violated", () => {
    test("THEN level 0 should be rejected", () => {
        expect(() => calculatePageTableIndex(9, 12, 0n, 0, AddrWidth.Bits64)).toThrow(PreconditionError);
    });

    test("THEN zero index bits should be rejected", () => {
        expect(() => calculatePageTableIndex(0, 12, 0n, 1, AddrWidth.Bits64)).toThrow(PreconditionError);
    });

    test("THEN zero page offset bits should be rejected", () => {
        expect(() => calculatePageTableIndex(9, 0, 0n, 1, AddrWidth.Bits64)).toThrow(PreconditionError);
    });

    test("THEN more than 64 index bits should be rejected", () => {
        expect(() => calculatePageTableIndex(65, 12, 0n, 1, AddrWidth.Bits64)).toThrow(PreconditionError);
    });

    test("THEN the error should name the offending parameter", () => {
        let error: unknown;
        try {
            calculatePageTableIndex(9, 12, 0n, 0, AddrWidth.Bits64);
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(PreconditionError);
        expect(error).toHaveProperty("parameter", "level");
        expect(error).toHaveProperty("value", 0);
    });
});
