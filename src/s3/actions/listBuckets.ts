import { DEFAULT_OWNER_ID, DEFAULT_OWNER_NAME } from "../../common/types.js";
import { S3_XMLNS, escapeXml, xmlDocument } from "../../common/xml.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import type { S3Reply, S3Request } from "../s3Types.js";

export function listBuckets(_request: S3Request, reply: S3Reply, engine: StorageEngine): void {
  const bucketsXml = engine
    .listBuckets()
    .map(
      (b) =>
        `<Bucket>` +
        `<Name>${escapeXml(b.name)}</Name>` +
        `<CreationDate>${b.creationDate.toISOString()}</CreationDate>` +
        `</Bucket>`,
    )
    .join("\n      ");

  const xml = xmlDocument(
    [
      `<ListAllMyBucketsResult xmlns="${S3_XMLNS}">`,
      `  <Owner>`,
      `    <ID>${DEFAULT_OWNER_ID}</ID>`,
      `    <DisplayName>${DEFAULT_OWNER_NAME}</DisplayName>`,
      `  </Owner>`,
      `  <Buckets>`,
      bucketsXml ? `      ${bucketsXml}` : "",
      `  </Buckets>`,
      `</ListAllMyBucketsResult>`,
    ].filter(Boolean),
  );

  reply.header("content-type", "application/xml");
  reply.status(200).send(xml);
}
