import { concatBytes } from "@ethereumjs/util";
import { Instruction, instructionBytes } from "./instruction";
import { OPCODES } from "./opcodes";

export enum ViolationKind {
    BadStart = "bad_start",
    Gap = "gap",
    Overlap = "overlap",
    DuplicateOffset = "duplicate_offset",
    SizeMismatch = "size_mismatch",
    MissingJumpDest = "missing_jumpdest",
    SpuriousJumpDest = "spurious_jumpdest"
}

export interface InvariantViolation {
    kind: ViolationKind;
    /**
     * Offset the violation was found at
     */
    offset: number;
    message: string;
}

function isJumpDest(instr: Instruction): boolean {
    return instr.op.opcode === OPCODES.JUMPDEST;
}

/**
 * Assembly IR: an ordered, contiguous sequence of instructions plus the set of
 * offsets that are legal jump destinations. Instructions are kept in a single array
 * and located by offset through an offset-to-index map.
 *
 * Modules built by `disassemble()` satisfy every invariant checked by `validate()`.
 * Modules built directly from hand-made instructions are not checked on
 * construction; call `validate()` to find out whether they would round-trip.
 */
export class AssemblyModule implements Iterable<Instruction> {
    private readonly _instructions: readonly Instruction[];
    private readonly offsetIndex: Map<number, number>;
    private readonly _jumpDests: ReadonlySet<number>;

    /**
     * @param jumpDests Offsets of jump destinations. When omitted they are taken from
     * the JUMPDEST instructions in `instructions`.
     */
    constructor(instructions: Iterable<Instruction>, jumpDests?: Iterable<number>) {
        this._instructions = Object.freeze([...instructions]);
        this.offsetIndex = new Map();

        this._instructions.forEach((instr, idx) => {
            if (!this.offsetIndex.has(instr.offset)) {
                this.offsetIndex.set(instr.offset, idx);
            }
        });

        this._jumpDests = new Set(
            jumpDests !== undefined
                ? jumpDests
                : this._instructions.filter(isJumpDest).map((instr) => instr.offset)
        );
    }

    /**
     * Number of instructions
     */
    get length(): number {
        return this._instructions.length;
    }

    /**
     * Number of bytes the instructions occupy
     */
    get byteLength(): number {
        return this._instructions.reduce((acc, instr) => acc + instr.size, 0);
    }

    get(index: number): Instruction | undefined {
        return this._instructions[index];
    }

    indexAt(offset: number): number | undefined {
        return this.offsetIndex.get(offset);
    }

    /**
     * Return the instruction starting at `offset`. Offsets inside an instruction's
     * immediate are not instruction starts and yield undefined.
     */
    instructionAt(offset: number): Instruction | undefined {
        const idx = this.offsetIndex.get(offset);

        return idx === undefined ? undefined : this._instructions[idx];
    }

    isValidJumpDest(offset: number): boolean {
        return this._jumpDests.has(offset);
    }

    /**
     * Sorted jump destination offsets
     */
    jumpDests(): number[] {
        return [...this._jumpDests].sort((a, b) => a - b);
    }

    instructions(): IterableIterator<Instruction> {
        return this._instructions.values();
    }

    [Symbol.iterator](): Iterator<Instruction> {
        return this.instructions();
    }

    /**
     * Reassemble the bytecode. Inverse of `disassemble()`.
     *
     * @throws SizeMismatchError if an instruction's size disagrees with its payload
     */
    toBytes(): Uint8Array {
        return concatBytes(...this._instructions.map(instructionBytes));
    }

    /**
     * Check the structural invariants of the module and return every violation found.
     */
    validate(): InvariantViolation[] {
        const res: InvariantViolation[] = [];
        const seen = new Set<number>();

        let expected = 0;

        for (const instr of this._instructions) {
            const impliedSize = 1 + instr.immediate.length;

            if (
                instr.size !== impliedSize ||
                instr.immediate.length > instr.op.immediateLength
            ) {
                res.push({
                    kind: ViolationKind.SizeMismatch,
                    offset: instr.offset,
                    message: `${instr.op.mnemonic} declares size ${instr.size} with ${instr.immediate.length} immediate bytes`
                });
            }

            if (seen.has(instr.offset)) {
                res.push({
                    kind: ViolationKind.DuplicateOffset,
                    offset: instr.offset,
                    message: `More than one instruction starts at ${instr.offset}`
                });
            }

            seen.add(instr.offset);

            if (instr.offset !== expected) {
                let kind: ViolationKind;

                if (expected === 0) {
                    kind = ViolationKind.BadStart;
                } else {
                    kind = instr.offset > expected ? ViolationKind.Gap : ViolationKind.Overlap;
                }

                res.push({
                    kind,
                    offset: instr.offset,
                    message: `Expected instruction at ${expected}, found one at ${instr.offset}`
                });
            }

            expected = instr.offset + instr.size;
        }

        for (const instr of this._instructions) {
            if (isJumpDest(instr) && !this._jumpDests.has(instr.offset)) {
                res.push({
                    kind: ViolationKind.MissingJumpDest,
                    offset: instr.offset,
                    message: `JUMPDEST at ${instr.offset} is not in the jump destination set`
                });
            }
        }

        for (const dest of this.jumpDests()) {
            const instr = this.instructionAt(dest);

            if (instr === undefined || !isJumpDest(instr)) {
                res.push({
                    kind: ViolationKind.SpuriousJumpDest,
                    offset: dest,
                    message: `Jump destination ${dest} is not a JUMPDEST instruction`
                });
            }
        }

        return res;
    }
}
