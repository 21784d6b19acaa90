import type { Codec } from './codec.js'

// Opcodes of the pickle virtual machine used here (protocol 2 on write, up to 5 on read)
const MARK = 0x28 // (
const STOP = 0x2e // .
const NONE = 0x4e // N
const BINFLOAT = 0x47 // G
const BININT = 0x4a // J
const BININT1 = 0x4b // K
const BININT2 = 0x4d // M
const BINUNICODE = 0x58 // X
const APPEND = 0x61 // a
const APPENDS = 0x65 // e
const BINGET = 0x68 // h
const LONG_BINGET = 0x6a // j
const BINPUT = 0x71 // q
const LONG_BINPUT = 0x72 // r
const SETITEM = 0x73 // s
const TUPLE = 0x74 // t
const SETITEMS = 0x75 // u
const EMPTY_DICT = 0x7d // }
const EMPTY_LIST = 0x5d // ]
const EMPTY_TUPLE = 0x29 // )
const PROTO = 0x80
const TUPLE1 = 0x85
const TUPLE2 = 0x86
const TUPLE3 = 0x87
const NEWTRUE = 0x88
const NEWFALSE = 0x89
const LONG1 = 0x8a
const LONG4 = 0x8b
const SHORT_BINUNICODE = 0x8c
const BINUNICODE8 = 0x8d
const MEMOIZE = 0x94
const FRAME = 0x95

type PickleValue = null | boolean | number | bigint | string | PickleValue[] | PickleDict
interface PickleDict {
  [key: string]: PickleValue
}

const WRITE_PROTOCOL = 2
const HIGHEST_PROTOCOL = 5

function encodeLong(value: bigint): Buffer {
  if (value === 0n) return Buffer.alloc(0)
  const bytes: number[] = []
  let rest = value
  for (;;) {
    const byte = Number(rest & 0xffn)
    bytes.push(byte)
    rest >>= 8n
    // stop once the remaining bits are pure sign extension of the last byte
    if ((rest === 0n && (byte & 0x80) === 0) || (rest === -1n && (byte & 0x80) !== 0)) break
  }
  return Buffer.from(bytes)
}

function decodeLong(bytes: Buffer): number | bigint {
  let value = 0n
  for (let idx = bytes.length - 1; idx >= 0; idx--) value = (value << 8n) | BigInt(bytes[idx])
  if (bytes.length > 0 && (bytes[bytes.length - 1] & 0x80) !== 0) value -= 1n << BigInt(bytes.length * 8)
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value
}

function isSpecialObject(value: object): boolean {
  return value instanceof Date || value instanceof Map || value instanceof Set || value instanceof RegExp || ArrayBuffer.isView(value)
}

class PickleWriter {
  private parts: Buffer[] = []
  private ancestors = new Set<object>()

  op(code: number): void {
    this.parts.push(Buffer.from([code]))
  }

  write(value: unknown): void {
    switch (typeof value) {
      case 'boolean':
        this.op(value ? NEWTRUE : NEWFALSE)
        return
      case 'number':
        this.writeNumber(value)
        return
      case 'bigint':
        this.writeLong(value)
        return
      case 'string': {
        const utf8 = Buffer.from(value, 'utf8')
        const header = Buffer.alloc(5)
        header.writeUInt8(BINUNICODE, 0)
        header.writeUInt32LE(utf8.length, 1)
        this.parts.push(header, utf8)
        return
      }
      case 'object':
        if (value === null) this.op(NONE)
        else this.writeContainer(value)
        return
      default:
        throw new TypeError(`values of type ${typeof value} cannot be pickled`)
    }
  }

  private writeNumber(value: number): void {
    if (Number.isSafeInteger(value) && !Object.is(value, -0)) {
      if (value >= 0 && value < 0x100) {
        this.parts.push(Buffer.from([BININT1, value]))
      } else if (value >= 0 && value < 0x10000) {
        const buf = Buffer.alloc(3)
        buf.writeUInt8(BININT2, 0)
        buf.writeUInt16LE(value, 1)
        this.parts.push(buf)
      } else if (value >= -0x80000000 && value < 0x80000000) {
        const buf = Buffer.alloc(5)
        buf.writeUInt8(BININT, 0)
        buf.writeInt32LE(value, 1)
        this.parts.push(buf)
      } else {
        this.writeLong(BigInt(value))
      }
      return
    }
    const buf = Buffer.alloc(9)
    buf.writeUInt8(BINFLOAT, 0)
    buf.writeDoubleBE(value, 1)
    this.parts.push(buf)
  }

  private writeLong(value: bigint): void {
    const bytes = encodeLong(value)
    if (bytes.length < 0x100) {
      this.parts.push(Buffer.from([LONG1, bytes.length]), bytes)
    } else {
      const header = Buffer.alloc(5)
      header.writeUInt8(LONG4, 0)
      header.writeInt32LE(bytes.length, 1)
      this.parts.push(header, bytes)
    }
  }

  private writeContainer(value: object): void {
    if (isSpecialObject(value)) throw new TypeError(`${value.constructor.name} values cannot be pickled`)
    if (this.ancestors.has(value)) throw new TypeError('cyclic structures cannot be pickled')
    this.ancestors.add(value)
    if (Array.isArray(value)) {
      this.op(EMPTY_LIST)
      if (value.length > 0) {
        this.op(MARK)
        for (const item of value) this.write(item)
        this.op(APPENDS)
      }
    } else {
      // undefined members are left out, as JSON.stringify does
      const entries = Object.entries(value).filter(([, v]) => v !== undefined)
      this.op(EMPTY_DICT)
      if (entries.length > 0) {
        this.op(MARK)
        for (const [key, item] of entries) {
          this.write(key)
          this.write(item)
        }
        this.op(SETITEMS)
      }
    }
    this.ancestors.delete(value)
  }

  finish(): Buffer {
    return Buffer.concat([Buffer.from([PROTO, WRITE_PROTOCOL]), ...this.parts, Buffer.from([STOP])])
  }
}

class PickleReader {
  private pos = 0
  private stack: PickleValue[] = []
  private marks: number[] = []
  private memo = new Map<number, PickleValue>()

  constructor(private data: Buffer) {}

  private take(length: number): Buffer {
    if (this.pos + length > this.data.length) throw new Error('pickle data was truncated')
    const chunk = this.data.subarray(this.pos, this.pos + length)
    this.pos += length
    return chunk
  }

  private top(): PickleValue {
    if (this.stack.length === 0) throw new Error('pickle stack underflow')
    return this.stack[this.stack.length - 1]
  }

  private pop(): PickleValue {
    const value = this.top()
    this.stack.length--
    return value
  }

  private popMark(): PickleValue[] {
    const mark = this.marks.pop()
    if (mark === undefined) throw new Error('pickle mark not found')
    return this.stack.splice(mark)
  }

  private popItems(count: number): PickleValue[] {
    if (this.stack.length < count) throw new Error('pickle stack underflow')
    return this.stack.splice(this.stack.length - count)
  }

  private targetList(): PickleValue[] {
    const list = this.top()
    if (!Array.isArray(list)) throw new Error('append target is not a list')
    return list
  }

  private targetDict(): PickleDict {
    const dict = this.top()
    if (typeof dict !== 'object' || dict === null || Array.isArray(dict)) throw new Error('setitem target is not a dict')
    return dict
  }

  private setItems(dict: PickleDict, items: PickleValue[]): void {
    if (items.length % 2 !== 0) throw new Error('odd number of items for dict')
    for (let idx = 0; idx < items.length; idx += 2) {
      const key = items[idx]
      if (typeof key !== 'string' && typeof key !== 'number' && typeof key !== 'bigint')
        throw new Error(`unsupported dict key of type ${typeof key}`)
      Object.defineProperty(dict, String(key), { value: items[idx + 1], enumerable: true, writable: true, configurable: true })
    }
  }

  private memoGet(index: number): PickleValue {
    const value = this.memo.get(index)
    if (value === undefined) throw new Error(`memo entry ${index} is missing`)
    return value
  }

  read(): PickleValue {
    for (;;) {
      const code = this.take(1).readUInt8(0)
      switch (code) {
        case PROTO: {
          const protocol = this.take(1).readUInt8(0)
          if (protocol > HIGHEST_PROTOCOL) throw new Error(`unsupported pickle protocol ${protocol}`)
          break
        }
        case FRAME:
          this.take(8)
          break
        case STOP:
          return this.pop()
        case MARK:
          this.marks.push(this.stack.length)
          break
        case NONE:
          this.stack.push(null)
          break
        case NEWTRUE:
          this.stack.push(true)
          break
        case NEWFALSE:
          this.stack.push(false)
          break
        case BININT1:
          this.stack.push(this.take(1).readUInt8(0))
          break
        case BININT2:
          this.stack.push(this.take(2).readUInt16LE(0))
          break
        case BININT:
          this.stack.push(this.take(4).readInt32LE(0))
          break
        case LONG1:
          this.stack.push(decodeLong(this.take(this.take(1).readUInt8(0))))
          break
        case LONG4: {
          const length = this.take(4).readInt32LE(0)
          if (length < 0) throw new Error('negative LONG4 length')
          this.stack.push(decodeLong(this.take(length)))
          break
        }
        case BINFLOAT:
          this.stack.push(this.take(8).readDoubleBE(0))
          break
        case SHORT_BINUNICODE:
          this.stack.push(this.take(this.take(1).readUInt8(0)).toString('utf8'))
          break
        case BINUNICODE:
          this.stack.push(this.take(this.take(4).readUInt32LE(0)).toString('utf8'))
          break
        case BINUNICODE8:
          this.stack.push(this.take(Number(this.take(8).readBigUInt64LE(0))).toString('utf8'))
          break
        case EMPTY_LIST:
          this.stack.push([])
          break
        case EMPTY_DICT:
          this.stack.push({})
          break
        case EMPTY_TUPLE:
          this.stack.push([])
          break
        case TUPLE:
          this.stack.push(this.popMark())
          break
        case TUPLE1:
          this.stack.push(this.popItems(1))
          break
        case TUPLE2:
          this.stack.push(this.popItems(2))
          break
        case TUPLE3:
          this.stack.push(this.popItems(3))
          break
        case APPEND: {
          const item = this.pop()
          this.targetList().push(item)
          break
        }
        case APPENDS: {
          const items = this.popMark()
          this.targetList().push(...items)
          break
        }
        case SETITEM: {
          const items = this.popItems(2)
          this.setItems(this.targetDict(), items)
          break
        }
        case SETITEMS: {
          const items = this.popMark()
          this.setItems(this.targetDict(), items)
          break
        }
        case BINPUT:
          this.memo.set(this.take(1).readUInt8(0), this.top())
          break
        case LONG_BINPUT:
          this.memo.set(this.take(4).readUInt32LE(0), this.top())
          break
        case MEMOIZE:
          this.memo.set(this.memo.size, this.top())
          break
        case BINGET:
          this.stack.push(this.memoGet(this.take(1).readUInt8(0)))
          break
        case LONG_BINGET:
          this.stack.push(this.memoGet(this.take(4).readUInt32LE(0)))
          break
        default:
          throw new Error(`unsupported pickle opcode 0x${code.toString(16)} at offset ${this.pos - 1}`)
      }
    }
  }
}

/**
 * Python pickle data. Writes protocol 2; reads the plain-data subset of protocols 2 to 5.
 * Tuples come back as arrays, integers beyond the safe range as bigint.
 */
export const pickleCodec: Codec = {
  encode(record: unknown): Buffer {
    const writer = new PickleWriter()
    writer.write(record)
    return writer.finish()
  },

  decode(data: Buffer): unknown {
    return new PickleReader(data).read()
  },
}
