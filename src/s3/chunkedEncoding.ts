/**
 * Decode an `aws-chunked` payload back into the object bytes.
 * Format: <hex-size>[;chunk-signature=...]\r\n<data>\r\n ... 0\r\n[<trailers>\r\n]\r\n
 *
 * Returns `undefined` when the framing is malformed or ends before the
 * terminating zero-length chunk.
 */
export function decodeAwsChunked(buf: Buffer): Buffer | undefined {
  const chunks: Buffer[] = [];
  let offset = 0;

  while (offset < buf.length) {
    const crlfIndex = buf.indexOf("\r\n", offset);
    if (crlfIndex === -1) return undefined;

    // chunk extensions such as ";chunk-signature=..." follow the size
    const sizeField = buf.subarray(offset, crlfIndex).toString("ascii").split(";")[0].trim();
    if (!/^[0-9a-fA-F]+$/.test(sizeField)) return undefined;
    const chunkSize = parseInt(sizeField, 16);

    // trailers (x-amz-checksum-*) after the final chunk are not part of the object
    if (chunkSize === 0) return Buffer.concat(chunks);

    const dataStart = crlfIndex + 2;
    const dataEnd = dataStart + chunkSize;
    if (dataEnd + 2 > buf.length || buf.toString("ascii", dataEnd, dataEnd + 2) !== "\r\n") {
      return undefined;
    }
    chunks.push(buf.subarray(dataStart, dataEnd));
    offset = dataEnd + 2;
  }

  return undefined;
}

export function isAwsChunked(contentEncoding: string | undefined, contentSha256: string | undefined): boolean {
  if (contentEncoding?.split(",").some((coding) => coding.trim() === "aws-chunked")) return true;
  return contentSha256?.startsWith("STREAMING-") ?? false;
}
