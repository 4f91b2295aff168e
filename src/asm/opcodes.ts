import { Common, Hardfork } from "@ethereumjs/common";
import { assert } from "solc-typed-ast";
import opcodeData from "./opcodes.json";

export enum OpcodeCategory {
    Arithmetic = "arithmetic",
    Comparison = "comparison",
    Bitwise = "bitwise",
    Hashing = "hashing",
    Environment = "environment",
    Block = "block",
    Stack = "stack",
    Memory = "memory",
    Storage = "storage",
    ControlFlow = "control-flow",
    JumpDest = "jumpdest",
    Logging = "logging",
    System = "system",
    Invalid = "invalid"
}

/**
 * How execution continues once an instruction completes
 */
export enum InstructionControlFlow {
    NextInstruction = "next",
    JumpToTopOfStack = "jump",
    ConditionalJumpToTopOfStack = "jumpi",
    ExternalCall = "call",
    Return = "return",
    Revert = "revert",
    Stop = "stop",
    StopInvalid = "invalid"
}

export interface OpcodeDescriptor {
    readonly opcode: number;
    readonly mnemonic: string;
    /**
     * Number of immediate bytes following the opcode byte. Non-zero only for PUSH1..PUSH32.
     */
    readonly immediateLength: number;
    readonly category: OpcodeCategory;
    readonly controlFlow: InstructionControlFlow;
    /**
     * False for bytes that the instruction set (or the selected hardfork) gives no meaning.
     * Such bytes still decode as complete one-byte instructions.
     */
    readonly assigned: boolean;
    readonly hardfork: Hardfork | undefined;
    readonly eip: number | undefined;
    readonly aliases: readonly string[];
    readonly description: string;
}

/**
 * Opcodes referenced directly by the decoder and the predicates below.
 */
export enum OPCODES {
    STOP = 0x00,
    KECCAK256 = 0x20,
    CALLDATACOPY = 0x37,
    CODECOPY = 0x39,
    EXTCODECOPY = 0x3c,
    RETURNDATACOPY = 0x3e,
    MSTORE = 0x52,
    MSTORE8 = 0x53,
    JUMP = 0x56,
    JUMPI = 0x57,
    JUMPDEST = 0x5b,
    MCOPY = 0x5e,
    PUSH0 = 0x5f,
    PUSH1 = 0x60,
    PUSH32 = 0x7f,
    DUP1 = 0x80,
    DUP16 = 0x8f,
    SWAP1 = 0x90,
    SWAP16 = 0x9f,
    LOG0 = 0xa0,
    LOG4 = 0xa4,
    CREATE = 0xf0,
    CALL = 0xf1,
    CALLCODE = 0xf2,
    RETURN = 0xf3,
    DELEGATECALL = 0xf4,
    CREATE2 = 0xf5,
    STATICCALL = 0xfa,
    REVERT = 0xfd,
    INVALID = 0xfe,
    SELFDESTRUCT = 0xff
}

export const UNASSIGNED_MNEMONIC = "UNKNOWN";

/**
 * Shape of a record in opcodes.json
 */
interface RawOpcodeEntry {
    opcode: string;
    mnemonic: string;
    category: string;
    immediate?: number;
    controlFlow?: string;
    hardfork: string;
    eip?: number;
    aliases?: string[];
    description: string;
}

function isEnumValue<T extends string>(enumObj: Record<string, T>, val: string): val is T {
    const values: string[] = Object.values(enumObj);

    return values.includes(val);
}

function parseEntry(entry: RawOpcodeEntry): OpcodeDescriptor {
    const opcode = Number.parseInt(entry.opcode, 16);
    const immediateLength = entry.immediate === undefined ? 0 : entry.immediate;
    const controlFlow =
        entry.controlFlow === undefined ? InstructionControlFlow.NextInstruction : entry.controlFlow;

    assert(
        opcode >= 0 && opcode < 256,
        `Opcode {0} of {1} out of range`,
        entry.opcode,
        entry.mnemonic
    );
    assert(
        immediateLength >= 0 && immediateLength <= 32,
        `Bad immediate length {0} for {1}`,
        immediateLength,
        entry.mnemonic
    );
    assert(
        isEnumValue(OpcodeCategory, entry.category),
        `Unknown category {0} for {1}`,
        entry.category,
        entry.mnemonic
    );
    assert(
        isEnumValue(InstructionControlFlow, controlFlow),
        `Unknown control flow {0} for {1}`,
        controlFlow,
        entry.mnemonic
    );
    assert(
        isEnumValue(Hardfork, entry.hardfork),
        `Unknown hardfork {0} for {1}`,
        entry.hardfork,
        entry.mnemonic
    );

    return Object.freeze({
        opcode,
        mnemonic: entry.mnemonic,
        immediateLength,
        category: entry.category,
        controlFlow,
        assigned: true,
        hardfork: entry.hardfork,
        eip: entry.eip,
        aliases: Object.freeze(entry.aliases === undefined ? [] : [...entry.aliases]),
        description: entry.description
    });
}

export function unassignedDescriptor(opcode: number): OpcodeDescriptor {
    return Object.freeze({
        opcode,
        mnemonic: UNASSIGNED_MNEMONIC,
        immediateLength: 0,
        category: OpcodeCategory.Invalid,
        controlFlow: InstructionControlFlow.StopInvalid,
        assigned: false,
        hardfork: undefined,
        eip: undefined,
        aliases: Object.freeze([]),
        description: "Unassigned opcode."
    });
}

/**
 * Fixed 256-entry lookup from a byte value to its descriptor.
 */
export class OpcodeTable implements Iterable<OpcodeDescriptor> {
    private readonly descriptors: readonly OpcodeDescriptor[];
    private readonly byMnemonic: Map<string, OpcodeDescriptor>;

    constructor(descriptors: Iterable<OpcodeDescriptor>) {
        const table = Object.freeze([...descriptors]);

        assert(table.length === 256, `Opcode table must have 256 entries, not {0}`, table.length);

        this.byMnemonic = new Map();

        table.forEach((desc, i) => {
            assert(desc.opcode === i, `Descriptor for {0} placed at index {1}`, desc.opcode, i);

            if (!desc.assigned) {
                return;
            }

            for (const name of [desc.mnemonic, ...desc.aliases]) {
                const key = name.toUpperCase();

                assert(!this.byMnemonic.has(key), `Duplicate mnemonic {0}`, name);

                this.byMnemonic.set(key, desc);
            }
        });

        this.descriptors = table;
    }

    /**
     * Build the table of opcodes active at the hardfork of `common`. Opcodes
     * introduced by later hardforks are unassigned in the result.
     */
    static forHardfork(common: Common, base: OpcodeTable = OPCODE_TABLE): OpcodeTable {
        return new OpcodeTable(
            base.descriptors.map((desc) =>
                desc.hardfork !== undefined && !common.gteHardfork(desc.hardfork)
                    ? unassignedDescriptor(desc.opcode)
                    : desc
            )
        );
    }

    describe(byte: number): OpcodeDescriptor {
        assert(Number.isInteger(byte) && byte >= 0 && byte < 256, `Invalid EVM opcode {0}`, byte);

        return this.descriptors[byte];
    }

    /**
     * Resolve a mnemonic or one of its historical aliases (case-insensitive).
     */
    lookup(mnemonic: string): OpcodeDescriptor | undefined {
        return this.byMnemonic.get(mnemonic.toUpperCase());
    }

    assigned(): OpcodeDescriptor[] {
        return this.descriptors.filter((desc) => desc.assigned);
    }

    [Symbol.iterator](): Iterator<OpcodeDescriptor> {
        return this.descriptors[Symbol.iterator]();
    }
}

function buildDefaultTable(entries: readonly RawOpcodeEntry[]): OpcodeTable {
    const res: OpcodeDescriptor[] = [];

    for (let i = 0; i < 256; i++) {
        res.push(unassignedDescriptor(i));
    }

    for (const entry of entries) {
        const desc = parseEntry(entry);

        assert(res[desc.opcode].assigned === false, `Opcode {0} defined twice`, entry.opcode);

        res[desc.opcode] = desc;
    }

    return new OpcodeTable(res);
}

/**
 * Every opcode up to and including Cancun.
 */
export const OPCODE_TABLE = buildDefaultTable(opcodeData);

export function getOpInfo(
    arg: string | number,
    table: OpcodeTable = OPCODE_TABLE
): OpcodeDescriptor {
    if (typeof arg === "number") {
        return table.describe(arg);
    }

    const desc = table.lookup(arg);

    assert(desc !== undefined, `Unknown opcode mnemonic {0}`, arg);

    return desc;
}

export function isPush(op: OpcodeDescriptor): boolean {
    return op.assigned && op.opcode >= OPCODES.PUSH0 && op.opcode <= OPCODES.PUSH32;
}

export function isDup(op: OpcodeDescriptor): boolean {
    return op.assigned && op.opcode >= OPCODES.DUP1 && op.opcode <= OPCODES.DUP16;
}

export function isSwap(op: OpcodeDescriptor): boolean {
    return op.assigned && op.opcode >= OPCODES.SWAP1 && op.opcode <= OPCODES.SWAP16;
}

export function isLog(op: OpcodeDescriptor): boolean {
    return op.assigned && op.opcode >= OPCODES.LOG0 && op.opcode <= OPCODES.LOG4;
}

/**
 * Return true IFF the op ends execution of the current contract
 */
export function isTerminator(op: OpcodeDescriptor): boolean {
    if (!op.assigned) {
        return false;
    }

    return (
        op.opcode === OPCODES.STOP ||
        op.opcode === OPCODES.RETURN ||
        op.opcode === OPCODES.REVERT ||
        op.opcode === OPCODES.INVALID ||
        op.opcode === OPCODES.SELFDESTRUCT
    );
}

export function isControlFlow(op: OpcodeDescriptor): boolean {
    return (
        op.assigned &&
        (op.opcode === OPCODES.JUMP ||
            op.opcode === OPCODES.JUMPI ||
            op.opcode === OPCODES.JUMPDEST)
    );
}

/**
 * Return true IFF the provided op makes an external call or creates a contract
 */
export function isExternalCall(op: OpcodeDescriptor): boolean {
    return op.assigned && op.controlFlow === InstructionControlFlow.ExternalCall;
}

/**
 * Return true IFF the provided op changes the memory
 */
export function changesMemory(op: OpcodeDescriptor): boolean {
    if (!op.assigned) {
        return false;
    }

    return (
        op.opcode === OPCODES.MSTORE ||
        op.opcode === OPCODES.MSTORE8 ||
        op.opcode === OPCODES.MCOPY ||
        op.opcode === OPCODES.CALLDATACOPY ||
        op.opcode === OPCODES.CODECOPY ||
        op.opcode === OPCODES.EXTCODECOPY ||
        op.opcode === OPCODES.RETURNDATACOPY ||
        op.opcode === OPCODES.CALL ||
        op.opcode === OPCODES.CALLCODE ||
        op.opcode === OPCODES.DELEGATECALL ||
        op.opcode === OPCODES.STATICCALL
    );
}

export function createsContract(op: OpcodeDescriptor): boolean {
    return op.assigned && (op.opcode === OPCODES.CREATE || op.opcode === OPCODES.CREATE2);
}
