export class ByteReader {
	private internalOffset = 0;
	private readonly bytes: Buffer;

	constructor(source: Uint8Array) {
		this.bytes = Buffer.from(source.buffer, source.byteOffset, source.byteLength);
	}

	get bytesRemaining() {
		return this.bytes.length - this.internalOffset;
	}

	get offset() {
		return this.internalOffset;
	}

	////////////////
	// READ METHODS

	/** Returns a copy, so nothing read keeps the source buffer alive. */
	readBytes(numBytes: number) {
		this.checkBounds(numBytes);
		const bytes = new Uint8Array(this.bytes.subarray(this.internalOffset, this.internalOffset + numBytes));
		this.internalOffset += numBytes;
		return bytes;
	}

	readUInt8() {
		this.checkBounds(1);
		const value = this.bytes.readUInt8(this.internalOffset);
		this.internalOffset += 1;
		return value;
	}

	readUInt16() {
		this.checkBounds(2);
		const value = this.bytes.readUInt16LE(this.internalOffset);
		this.internalOffset += 2;
		return value;
	}

	/** Single-byte characters, as used by the fixed ASCII fields. */
	readChar8(length: number) {
		this.checkBounds(length);
		const value = this.bytes.toString('latin1', this.internalOffset, this.internalOffset + length);
		this.internalOffset += length;
		return value;
	}

	private checkBounds(numBytes: number) {
		if (this.internalOffset + numBytes > this.bytes.length) throw new RangeError('Read out of bounds.');
	}
}
