/**
 * Disseminated formats are a closed set of variants; the registry resolves a
 * prefix to one of them.
 */
export type XmlFormatDescriptor = {
  kind: "xml";
  prefix: string;
  schema: string;
  namespace: string;
  rootTag: string;
};

export type JsonFormatDescriptor = {
  kind: "json";
  prefix: string;
  mediaType: string;
};

export type MetadataFormatDescriptor = XmlFormatDescriptor | JsonFormatDescriptor;

const METADATA_PREFIX_PATTERN = /^[A-Za-z0-9\-_.!~*'()]+$/;

export const isValidMetadataPrefix = (value: string): boolean => METADATA_PREFIX_PATTERN.test(value);

export const oaiDublinCore: XmlFormatDescriptor = {
  kind: "xml",
  prefix: "oai_dc",
  schema: "http://www.openarchives.org/OAI/2.0/oai_dc.xsd",
  namespace: "http://www.openarchives.org/OAI/2.0/oai_dc/",
  rootTag: "oai_dc:dc"
};
