import {
  PDFArray,
  PDFContentStream,
  PDFDict,
  PDFName,
  PDFNumber,
  PDFRawStream,
  decodePDFRawStream,
  type PDFObject,
} from 'pdf-lib';

export function numberOf(value: PDFObject | undefined): number | undefined {
  return value instanceof PDFNumber ? value.asNumber() : undefined;
}

export function nameOf(value: PDFObject | undefined): string | undefined {
  return value instanceof PDFName ? value.decodeText() : undefined;
}

export function dictOf(value: PDFObject | undefined): PDFDict | undefined {
  return value instanceof PDFDict ? value : undefined;
}

export function arrayOf(value: PDFObject | undefined): PDFArray | undefined {
  return value instanceof PDFArray ? value : undefined;
}

export function lookupKey(dict: PDFDict | undefined, key: string): PDFObject | undefined {
  return dict?.lookup(PDFName.of(key));
}

/** Items of a PDF array with indirect references resolved. */
export function arrayItems(array: PDFArray | undefined): PDFObject[] {
  if (!array) return [];
  const items: PDFObject[] = [];
  for (let i = 0; i < array.size(); i += 1) {
    const item = array.lookup(i);
    if (item !== undefined) items.push(item);
  }
  return items;
}

/** Filtered bytes of a stream object, with its filters undone. */
export function decodeStreamBytes(stream: PDFObject | undefined): Uint8Array {
  if (stream instanceof PDFRawStream) {
    return decodePDFRawStream(stream).decode();
  }
  if (stream instanceof PDFContentStream) {
    return stream.getUnencodedContents();
  }
  throw new Error(`Expected a stream object, got ${stream?.constructor.name ?? 'nothing'}`);
}
