export const S3_XMLNS = "http://s3.amazonaws.com/doc/2006-03-01/";

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function xmlDocument(lines: string[]): string {
  return [`<?xml version="1.0" encoding="UTF-8"?>`, ...lines].join("\n");
}
