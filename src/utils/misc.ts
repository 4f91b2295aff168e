import { bytesToHex } from "@ethereumjs/util";

export type HexString = string;

export function toHexString(n: number | bigint | Uint8Array, padding = 0): HexString {
    let hex: string;

    if (n instanceof Uint8Array) {
        hex = bytesToHex(n).slice(2);
    } else {
        hex = n.toString(16);
    }

    if (hex.length < padding) {
        hex = hex.padStart(padding, "0");
    }

    return "0x" + hex;
}

/**
 * Convert a big-endian unsigned encoding to a bigint
 */
export function bigEndianBufToBigint(buf: Uint8Array): bigint {
    let res = BigInt(0);

    for (let i = 0; i < buf.length; i++) {
        res = res << BigInt(8);
        res += BigInt(buf[i]);
    }

    return res;
}
