import { Instruction, isTruncated } from "../asm/instruction";
import { AssemblyModule } from "../asm/module";
import { toHexString } from "./misc";

export function ppMnemonic(instr: Instruction): string {
    return instr.op.assigned
        ? instr.op.mnemonic
        : `${instr.op.mnemonic}(${toHexString(instr.op.opcode, 2)})`;
}

/**
 * Render an instruction as `<offset>: <mnemonic> [<immediate>]`, e.g. `0x0000: PUSH1 0x01`
 */
export function ppInstruction(instr: Instruction): string {
    let res = `${toHexString(instr.offset, 4)}: ${ppMnemonic(instr)}`;

    if (instr.immediate.length > 0) {
        res += ` ${toHexString(instr.immediate)}`;
    }

    if (isTruncated(instr)) {
        res += " (truncated)";
    }

    return res;
}

export function ppAssembly(module: AssemblyModule): string {
    return [...module.instructions()].map(ppInstruction).join("\n");
}
