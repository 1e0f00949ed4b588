import path from 'node:path';

export class MimeType {
  public static readonly PDF = 'application/pdf';
  public static readonly WORDPROCESSINGML_DOC =
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
  public static readonly MS_WORD = 'application/msword';
  public static readonly PLAIN_TEXT = 'text/plain';
  public static readonly APP_OCTET_STREAM = 'application/octet-stream';

  public static readonly Supported: readonly string[] = [
    MimeType.PDF,
    MimeType.WORDPROCESSINGML_DOC,
    MimeType.MS_WORD,
    MimeType.PLAIN_TEXT,
  ];

  public static isSupported(mime: string): boolean {
    return MimeType.Supported.includes(mime);
  }
}

// Compound File Binary container of legacy Office documents
const CompoundFileSignature = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

/**
 * Browsers label both .doc and .docx uploads as `application/msword`, the content tells them apart.
 */
export function isCompoundFileBinary(data: Buffer): boolean {
  return data.subarray(0, CompoundFileSignature.length).equals(CompoundFileSignature);
}

const ExtensionMimeTypes: Record<string, string> = {
  '.pdf': MimeType.PDF,
  '.docx': MimeType.WORDPROCESSINGML_DOC,
  '.doc': MimeType.MS_WORD,
  '.txt': MimeType.PLAIN_TEXT,
};

/**
 * Files read from disk carry no declared type, derive it from the extension like a browser upload would.
 */
export function mediaTypeForFileName(fileName: string): string {
  return ExtensionMimeTypes[path.extname(fileName).toLowerCase()] ?? MimeType.APP_OCTET_STREAM;
}
