import { isValidMetadataPrefix, oaiDublinCore, type MetadataFormatDescriptor } from "../../core/formats/formatDescriptor";
import type { FormatRegistry } from "../../ports/FormatRegistry";

export class StaticFormatRegistry implements FormatRegistry {
  private readonly prefixes: ReadonlySet<string>;

  constructor(descriptors: MetadataFormatDescriptor[] = [oaiDublinCore]) {
    const prefixes = new Set<string>();
    for (const descriptor of descriptors) {
      if (!isValidMetadataPrefix(descriptor.prefix)) {
        throw new Error(`Invalid metadata prefix: '${descriptor.prefix}'`);
      }
      if (prefixes.has(descriptor.prefix)) {
        throw new Error(`Duplicate metadata prefix: '${descriptor.prefix}'`);
      }
      prefixes.add(descriptor.prefix);
    }
    this.prefixes = prefixes;
  }

  exists(metadataFormat: string): boolean {
    return this.prefixes.has(metadataFormat);
  }
}
