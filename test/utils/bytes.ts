import { AssemblyModule } from "../../src";

/**
 * Deterministic 32-bit PRNG (mulberry32) so failures can be reproduced from the seed
 */
export function prng(seed: number): () => number {
    let state = seed >>> 0;

    return () => {
        state = (state + 0x6d2b79f5) >>> 0;

        let t = state;

        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);

        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function randomBytes(rand: () => number, len: number): Uint8Array {
    const res = new Uint8Array(len);

    for (let i = 0; i < len; i++) {
        res[i] = Math.floor(rand() * 256);
    }

    return res;
}

/**
 * Random code where roughly half the bytes are PUSH or JUMPDEST opcodes, so that
 * jump destination markers regularly land inside push data.
 */
export function pushHeavyCode(rand: () => number, len: number): Uint8Array {
    const res = randomBytes(rand, len);

    for (let i = 0; i < len; i++) {
        const r = rand();

        if (r < 0.3) {
            res[i] = 0x60 + Math.floor(rand() * 32);
        } else if (r < 0.5) {
            res[i] = 0x5b;
        }
    }

    return res;
}

/**
 * Offsets that hold 0x5b and start an instruction of `module`
 */
export function expectedJumpDests(code: Uint8Array, module: AssemblyModule): number[] {
    const res: number[] = [];

    for (let i = 0; i < code.length; i++) {
        if (code[i] === 0x5b && module.instructionAt(i) !== undefined) {
            res.push(i);
        }
    }

    return res;
}
