export class AsmError extends Error {
    constructor(message: string) {
        super(message);

        this.name = new.target.name;
    }
}

/**
 * Raised when reassembling an instruction whose declared size disagrees with
 * its opcode and immediate payload.
 */
export class SizeMismatchError extends AsmError {
    constructor(
        public readonly offset: number,
        public readonly mnemonic: string,
        public readonly declaredSize: number,
        public readonly actualSize: number
    ) {
        super(
            `Size mismatch for ${mnemonic} at offset ${offset}: declared ${declaredSize} bytes, payload implies ${actualSize}`
        );
    }
}
