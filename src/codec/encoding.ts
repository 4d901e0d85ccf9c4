/**
 * Session character encoding used to turn byte sequences into text
 */
export interface CharacterEncoding {
  readonly name: string;
  decode(bytes: Uint8Array): string;
}

// PostgreSQL encoding names (pg_encoding_to_char) to WHATWG encoding labels
const ENCODING_LABELS: Readonly<Record<string, string>> = {
  UTF8: 'utf-8',
  UNICODE: 'utf-8',
  SQL_ASCII: 'utf-8',
  LATIN1: 'iso-8859-1',
  LATIN2: 'iso-8859-2',
  LATIN3: 'iso-8859-3',
  LATIN4: 'iso-8859-4',
  LATIN5: 'iso-8859-9',
  LATIN6: 'iso-8859-10',
  LATIN7: 'iso-8859-13',
  LATIN8: 'iso-8859-14',
  LATIN9: 'iso-8859-15',
  LATIN10: 'iso-8859-16',
  ISO_8859_5: 'iso-8859-5',
  ISO_8859_6: 'iso-8859-6',
  ISO_8859_7: 'iso-8859-7',
  ISO_8859_8: 'iso-8859-8',
  KOI8R: 'koi8-r',
  KOI8U: 'koi8-u',
  WIN866: 'ibm866',
  WIN874: 'windows-874',
  WIN1250: 'windows-1250',
  WIN1251: 'windows-1251',
  WIN1252: 'windows-1252',
  WIN1253: 'windows-1253',
  WIN1254: 'windows-1254',
  WIN1255: 'windows-1255',
  WIN1256: 'windows-1256',
  WIN1257: 'windows-1257',
  WIN1258: 'windows-1258',
  EUC_JP: 'euc-jp',
  EUC_KR: 'euc-kr',
  SJIS: 'shift_jis',
  BIG5: 'big5',
  GBK: 'gbk',
  GB18030: 'gb18030',
};

/**
 * Map a PostgreSQL encoding name to a WHATWG label
 * Matching ignores case, dashes and underscores beyond the canonical spelling ("utf-8" → UTF8)
 */
export function getEncodingLabel(name: string): string | undefined {
  const upper = name.trim().toUpperCase();
  return ENCODING_LABELS[upper] ?? ENCODING_LABELS[upper.replace(/[-_]/g, '')];
}

/**
 * Create a decoder for a PostgreSQL client encoding
 * Throws for encodings this runtime cannot decode
 */
export function createCharacterEncoding(name: string): CharacterEncoding {
  const label = getEncodingLabel(name);
  if (!label) {
    throw new Error(`Unsupported client encoding: ${name}`);
  }
  const decoder = new TextDecoder(label);
  return {
    name: name.trim().toUpperCase(),
    decode: (bytes: Uint8Array) => decoder.decode(bytes),
  };
}
