import { concatBytes, setLengthRight } from "@ethereumjs/util";
import { assert } from "solc-typed-ast";
import { bigEndianBufToBigint } from "../utils/misc";
import { SizeMismatchError } from "./errors";
import { OPCODE_TABLE, OpcodeDescriptor, OpcodeTable, getOpInfo, isPush } from "./opcodes";

export interface Instruction {
    readonly op: OpcodeDescriptor;
    /**
     * Byte offset of the opcode in the code it was decoded from
     */
    readonly offset: number;
    /**
     * Immediate payload, owned by the instruction. Shorter than `op.immediateLength` only
     * when the code ended early. Must not be written to.
     */
    readonly immediate: Uint8Array;
    readonly size: number;
}

/**
 * Decode the single instruction starting at `offset` in `code`.
 *
 * A PUSH whose immediate runs past the end of `code` keeps only the bytes that
 * are available, so decoding never reads past the buffer and never fails.
 */
export function decodeInstruction(
    code: Uint8Array,
    offset: number,
    table: OpcodeTable = OPCODE_TABLE
): Instruction {
    assert(
        Number.isInteger(offset) && offset >= 0 && offset < code.length,
        `Offset {0} out of bounds for code of length {1}`,
        offset,
        code.length
    );

    const op = table.describe(code[offset]);
    const end = Math.min(offset + 1 + op.immediateLength, code.length);
    // Buffer.slice() returns a view, so copy explicitly
    const immediate = new Uint8Array(code.subarray(offset + 1, end));

    return Object.freeze({
        op,
        offset,
        immediate,
        size: 1 + immediate.length
    });
}

/**
 * Build an instruction programmatically, e.g. when constructing IR by hand.
 * `op` may be a descriptor, a byte value or a mnemonic.
 */
export function makeInstruction(
    op: OpcodeDescriptor | number | string,
    offset: number,
    immediate: Uint8Array = new Uint8Array()
): Instruction {
    const desc = typeof op === "object" ? op : getOpInfo(op);

    return Object.freeze({
        op: desc,
        offset,
        immediate: new Uint8Array(immediate),
        size: 1 + immediate.length
    });
}

export function isTruncated(instr: Instruction): boolean {
    return instr.immediate.length < instr.op.immediateLength;
}

/**
 * Return the value a PUSH instruction places on the stack, or undefined for any other
 * instruction. Missing trailing bytes of a truncated PUSH read as zero, as they do when
 * the EVM runs past the end of code.
 */
export function pushValue(instr: Instruction): bigint | undefined {
    if (!isPush(instr.op)) {
        return undefined;
    }

    return bigEndianBufToBigint(setLengthRight(instr.immediate, instr.op.immediateLength));
}

/**
 * Encode a single instruction: its opcode byte followed by its immediate.
 */
export function instructionBytes(instr: Instruction): Uint8Array {
    const impliedSize = 1 + instr.immediate.length;

    if (instr.size !== impliedSize) {
        throw new SizeMismatchError(instr.offset, instr.op.mnemonic, instr.size, impliedSize);
    }

    if (instr.immediate.length > instr.op.immediateLength) {
        throw new SizeMismatchError(
            instr.offset,
            instr.op.mnemonic,
            1 + instr.op.immediateLength,
            impliedSize
        );
    }

    return concatBytes(Uint8Array.of(instr.op.opcode), instr.immediate);
}
