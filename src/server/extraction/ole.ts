/**
 * Probes for OLE compound files (legacy Office containers)
 *
 * Password-protected OOXML documents are not ZIP packages but OLE files carrying an
 * EncryptedPackage stream; legacy .doc files carry a WordDocument stream whose FIB header
 * has an fEncrypted flag.
 */

const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];
const SECTOR_SIZE = 512;
const FIB_MAGIC = 0xa5ec;
const FIB_ENCRYPTED_FLAG = 0x0100;

export function isOleCompoundFile(bytes: Uint8Array): boolean {
  return bytes.length >= OLE_SIGNATURE.length && OLE_SIGNATURE.every((value, index) => bytes[index] === value);
}

export function isZipArchive(bytes: Uint8Array): boolean {
  return bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04;
}

/**
 * OLE directory entries store stream names as UTF-16LE
 */
export function containsStreamName(bytes: Uint8Array, name: string): boolean {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).includes(Buffer.from(name, 'utf16le'));
}

export function hasEncryptedPackage(bytes: Uint8Array): boolean {
  return isOleCompoundFile(bytes) && containsStreamName(bytes, 'EncryptedPackage');
}

/**
 * Find the Word FIB (it starts a sector with wIdent 0xA5EC) and read its fEncrypted bit
 */
export function isEncryptedWordDocument(bytes: Uint8Array): boolean {
  if (!isOleCompoundFile(bytes)) return false;
  const view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  for (let offset = SECTOR_SIZE; offset + 12 <= view.length; offset += SECTOR_SIZE) {
    if (view.readUInt16LE(offset) === FIB_MAGIC) {
      return (view.readUInt16LE(offset + 10) & FIB_ENCRYPTED_FLAG) !== 0;
    }
  }
  return false;
}
