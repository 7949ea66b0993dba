import crypto from 'node:crypto';

const UINT256_LIMIT = 2n ** 256n;

export function sha256(input: Buffer): Buffer {
    return crypto.createHash('sha256').update(input).digest();
}

export function hmacSha256(key: Buffer, message: string): Buffer {
    return crypto.createHmac('sha256', key).update(message).digest();
}

export function generateRandomBytes(size: number): Buffer {
    return crypto.randomBytes(size);
}

// Big-endian, any length
export function bufferToBigInt(buffer: Buffer): bigint {
    let result = 0n;
    for (const byte of buffer) {
        result = (result << 8n) | BigInt(byte);
    }
    return result;
}

export function uint256ToBuffer(value: bigint): Buffer {
    if (value < 0n || value >= UINT256_LIMIT) {
        throw new RangeError(`value does not fit in 256 bits: ${value}`);
    }
    return Buffer.from(value.toString(16).padStart(64, '0'), 'hex');
}

// Fresh 256-bit word: secure random bytes mixed with a secret
export function randomWord(secret: string): bigint {
    const random = generateRandomBytes(32);
    return bufferToBigInt(hmacSha256(Buffer.from(secret, 'utf8'), random.toString('hex')));
}
