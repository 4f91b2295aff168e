import { equalsBytes } from "@ethereumjs/util";
import { Instruction, decodeInstruction } from "./instruction";
import { AssemblyModule } from "./module";
import { OPCODE_TABLE, OPCODES, OpcodeTable } from "./opcodes";

export interface DisassemblerOptions {
    /**
     * Opcode table to decode with. Use `OpcodeTable.forHardfork()` to decode for a
     * specific hardfork. Defaults to `OPCODE_TABLE`.
     */
    table?: OpcodeTable;
}

/**
 * Decode `code` into an `AssemblyModule`.
 *
 * The pass is strictly sequential: the start of each instruction is only known once
 * the previous one (and its immediate) has been decoded. Bytes inside a PUSH immediate
 * are never decoded as instructions, so a 0x5b inside push data is not a jump
 * destination. Every byte value decodes, so this never fails.
 */
export function disassemble(code: Uint8Array, options: DisassemblerOptions = {}): AssemblyModule {
    const table = options.table === undefined ? OPCODE_TABLE : options.table;
    const instructions: Instruction[] = [];
    const jumpDests: number[] = [];

    let pc = 0;

    while (pc < code.length) {
        const instr = decodeInstruction(code, pc, table);

        if (instr.op.opcode === OPCODES.JUMPDEST) {
            jumpDests.push(pc);
        }

        instructions.push(instr);
        pc += instr.size;
    }

    return new AssemblyModule(instructions, jumpDests);
}

/**
 * Return true IFF disassembling and reassembling `code` reproduces it exactly
 */
export function checkRoundTrip(code: Uint8Array, options: DisassemblerOptions = {}): boolean {
    return equalsBytes(disassemble(code, options).toBytes(), code);
}
