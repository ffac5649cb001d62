/**
 * FIT weight file encoder
 *
 * Garmin Connect takes weigh-ins as uploaded FIT files. This writes the
 * smallest file it accepts: a file_id message (type weight) followed by one
 * weight_scale message.
 *
 * Layout: 14-byte header, definition + data record per message, CRC-16 over
 * everything after the header.
 */

/** FIT timestamps count seconds from 1989-12-31T00:00:00Z */
export const FIT_EPOCH_SECONDS = 631065600;

const HEADER_SIZE = 14;
const PROTOCOL_VERSION = 0x10;
const PROFILE_VERSION = 2093;

const FILE_TYPE_WEIGHT = 9;
const MANUFACTURER_DEVELOPMENT = 255;

const MESG_FILE_ID = 0;
const MESG_WEIGHT_SCALE = 30;

// Base types
const ENUM = 0x00;
const UINT16 = 0x84;
const UINT32 = 0x86;

const UINT16_INVALID = 0xffff;

const CRC_TABLE = [
  0x0000, 0xcc01, 0xd801, 0x1400, 0xf001, 0x3c00, 0x2800, 0xe401,
  0xa001, 0x6c00, 0x7800, 0xb401, 0x5000, 0x9c01, 0x8801, 0x4400,
];

export interface WeightScaleEntry {
  timestamp: Date;
  weightKg: number;
  percentFat?: number | null;
  bmi?: number | null;
}

interface FieldDef {
  num: number;
  size: number;
  baseType: number;
  value: number;
}

export function fitCrc(bytes: Uint8Array, initial: number = 0): number {
  let crc = initial;
  for (const byte of bytes) {
    let tmp = CRC_TABLE[crc & 0xf] ?? 0;
    crc = (crc >> 4) & 0x0fff;
    crc = crc ^ tmp ^ (CRC_TABLE[byte & 0xf] ?? 0);

    tmp = CRC_TABLE[crc & 0xf] ?? 0;
    crc = (crc >> 4) & 0x0fff;
    crc = crc ^ tmp ^ (CRC_TABLE[(byte >> 4) & 0xf] ?? 0);
  }
  return crc;
}

export function toFitTimestamp(date: Date): number {
  return Math.floor(date.getTime() / 1000) - FIT_EPOCH_SECONDS;
}

/** Scale and round; absent or out-of-range values become the invalid marker */
function scaledUint16(value: number | null | undefined, scale: number): number {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return UINT16_INVALID;
  }
  const scaled = Math.round(value * scale);
  return scaled >= 0 && scaled < UINT16_INVALID ? scaled : UINT16_INVALID;
}

class ByteWriter {
  private readonly bytes: number[] = [];

  u8(value: number): void {
    this.bytes.push(value & 0xff);
  }

  u16(value: number): void {
    this.u8(value);
    this.u8(value >> 8);
  }

  u32(value: number): void {
    this.u16(value & 0xffff);
    this.u16((value >>> 16) & 0xffff);
  }

  value(field: FieldDef): void {
    if (field.size === 1) this.u8(field.value);
    else if (field.size === 2) this.u16(field.value);
    else this.u32(field.value);
  }

  toArray(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

function writeMessage(out: ByteWriter, localType: number, globalNum: number, fields: FieldDef[]): void {
  // Definition record
  out.u8(0x40 | localType);
  out.u8(0); // reserved
  out.u8(0); // little endian
  out.u16(globalNum);
  out.u8(fields.length);
  for (const field of fields) {
    out.u8(field.num);
    out.u8(field.size);
    out.u8(field.baseType);
  }

  // Data record
  out.u8(localType);
  for (const field of fields) {
    out.value(field);
  }
}

/**
 * Encode one weigh-in as a FIT weight file.
 */
export function encodeWeightFile(entry: WeightScaleEntry, createdAt: Date = entry.timestamp): Uint8Array {
  const body = new ByteWriter();

  writeMessage(body, 0, MESG_FILE_ID, [
    { num: 0, size: 1, baseType: ENUM, value: FILE_TYPE_WEIGHT },
    { num: 1, size: 2, baseType: UINT16, value: MANUFACTURER_DEVELOPMENT },
    { num: 2, size: 2, baseType: UINT16, value: 0 },
    { num: 4, size: 4, baseType: UINT32, value: toFitTimestamp(createdAt) },
  ]);

  writeMessage(body, 1, MESG_WEIGHT_SCALE, [
    { num: 253, size: 4, baseType: UINT32, value: toFitTimestamp(entry.timestamp) },
    { num: 0, size: 2, baseType: UINT16, value: scaledUint16(entry.weightKg, 100) },
    { num: 1, size: 2, baseType: UINT16, value: scaledUint16(entry.percentFat, 100) },
    { num: 13, size: 2, baseType: UINT16, value: scaledUint16(entry.bmi, 10) },
  ]);

  const data = body.toArray();

  const header = new ByteWriter();
  header.u8(HEADER_SIZE);
  header.u8(PROTOCOL_VERSION);
  header.u16(PROFILE_VERSION);
  header.u32(data.length);
  for (const char of ".FIT") {
    header.u8(char.charCodeAt(0));
  }
  const headerBytes = header.toArray();
  const headerCrc = fitCrc(headerBytes);

  const file = new Uint8Array(HEADER_SIZE + data.length + 2);
  file.set(headerBytes, 0);
  file[12] = headerCrc & 0xff;
  file[13] = headerCrc >> 8;
  file.set(data, HEADER_SIZE);

  const crc = fitCrc(file.subarray(0, HEADER_SIZE + data.length));
  file[HEADER_SIZE + data.length] = crc & 0xff;
  file[HEADER_SIZE + data.length + 1] = crc >> 8;
  return file;
}
