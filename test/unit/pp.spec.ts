import expect from "expect";
import {
    bigEndianBufToBigint,
    decodeInstruction,
    disassemble,
    makeInstruction,
    ppAssembly,
    ppInstruction,
    toHexString
} from "../../src";

describe(`Pretty printing`, () => {
    it("Prints an instruction with its immediate", () => {
        expect(ppInstruction(makeInstruction("PUSH1", 0, Uint8Array.of(0x01)))).toEqual(
            "0x0000: PUSH1 0x01"
        );
        expect(ppInstruction(makeInstruction("PUSH0", 0x10))).toEqual("0x0010: PUSH0");
    });

    it("Prints unassigned opcodes with their byte", () => {
        expect(ppInstruction(makeInstruction(0x0c, 0x1f))).toEqual("0x001f: UNKNOWN(0x0c)");
    });

    it("Marks truncated immediates", () => {
        expect(ppInstruction(decodeInstruction(Uint8Array.of(0x7f, 0x01, 0x02), 0))).toEqual(
            "0x0000: PUSH32 0x0102 (truncated)"
        );
        expect(ppInstruction(decodeInstruction(Uint8Array.of(0x60), 0))).toEqual(
            "0x0000: PUSH1 (truncated)"
        );
    });

    it("Prints a module one instruction per line", () => {
        expect(ppAssembly(disassemble(Uint8Array.of(0x60, 0x01, 0x00)))).toEqual(
            "0x0000: PUSH1 0x01\n0x0002: STOP"
        );
        expect(ppAssembly(disassemble(new Uint8Array()))).toEqual("");
    });
});

describe(`Number helpers`, () => {
    it("Formats hex strings", () => {
        expect(toHexString(255)).toEqual("0xff");
        expect(toHexString(BigInt(1), 4)).toEqual("0x0001");
        expect(toHexString(Uint8Array.of(0x0a, 0xbc))).toEqual("0x0abc");
    });

    it("Converts big-endian bytes", () => {
        expect(bigEndianBufToBigint(new Uint8Array())).toEqual(BigInt(0));
        expect(bigEndianBufToBigint(Uint8Array.of(0x01, 0x00))).toEqual(BigInt(256));
    });
});
