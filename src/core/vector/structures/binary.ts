/**
 * Little-endian binary writer for structure files.
 */
export class BinaryWriter {
	private readonly parts: Buffer[] = [];

	writeUint8(value: number): this {
		const buf = Buffer.alloc(1);
		buf.writeUInt8(value, 0);
		this.parts.push(buf);
		return this;
	}

	writeUint32(value: number): this {
		const buf = Buffer.alloc(4);
		buf.writeUInt32LE(value, 0);
		this.parts.push(buf);
		return this;
	}

	writeInt32(value: number): this {
		const buf = Buffer.alloc(4);
		buf.writeInt32LE(value, 0);
		this.parts.push(buf);
		return this;
	}

	writeAscii(value: string): this {
		this.parts.push(Buffer.from(value, 'ascii'));
		return this;
	}

	writeFloat32Array(values: Float32Array): this {
		const buf = Buffer.alloc(values.length * 4);
		for (let i = 0; i < values.length; i++) {
			buf.writeFloatLE(values[i], i * 4);
		}
		this.parts.push(buf);
		return this;
	}

	writeUint32Array(values: readonly number[]): this {
		this.writeUint32(values.length);
		const buf = Buffer.alloc(values.length * 4);
		values.forEach((value, i) => buf.writeUInt32LE(value, i * 4));
		this.parts.push(buf);
		return this;
	}

	toBuffer(): Buffer {
		return Buffer.concat(this.parts);
	}
}

/**
 * Reader matching BinaryWriter. Reading past the end throws a RangeError.
 */
export class BinaryReader {
	private offset = 0;

	constructor(private readonly buffer: Buffer) {}

	readUint8(): number {
		const value = this.buffer.readUInt8(this.offset);
		this.offset += 1;
		return value;
	}

	readUint32(): number {
		const value = this.buffer.readUInt32LE(this.offset);
		this.offset += 4;
		return value;
	}

	readInt32(): number {
		const value = this.buffer.readInt32LE(this.offset);
		this.offset += 4;
		return value;
	}

	readAscii(length: number): string {
		const value = this.buffer.toString('ascii', this.offset, this.offset + length);
		this.offset += length;
		return value;
	}

	readFloat32Array(length: number): Float32Array {
		const out = new Float32Array(length);
		for (let i = 0; i < length; i++) {
			out[i] = this.buffer.readFloatLE(this.offset + i * 4);
		}
		this.offset += length * 4;
		return out;
	}

	readUint32Array(): number[] {
		const length = this.readUint32();
		const out: number[] = [];
		for (let i = 0; i < length; i++) {
			out.push(this.buffer.readUInt32LE(this.offset + i * 4));
		}
		this.offset += length * 4;
		return out;
	}

	get remaining(): number {
		return this.buffer.length - this.offset;
	}
}
