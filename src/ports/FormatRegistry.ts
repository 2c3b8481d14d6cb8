export interface FormatRegistry {
  exists(metadataFormat: string): boolean;
}
