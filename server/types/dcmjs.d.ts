// dcmjs ships no type declarations; only the parts used by the RT writer are described.
declare module 'dcmjs' {
  export type NaturalDataset = Record<string, unknown>;

  export interface DicomDictInstance {
    dict: Record<string, unknown>;
    write(options?: Record<string, unknown>): ArrayBuffer;
  }

  export interface DicomMessageFile {
    dict: Record<string, unknown>;
    meta: Record<string, unknown>;
  }

  const dcmjs: {
    data: {
      DicomMetaDictionary: {
        denaturalizeDataset(dataset: NaturalDataset): Record<string, unknown>;
        naturalizeDataset(dict: Record<string, unknown>): NaturalDataset;
      };
      DicomDict: new (meta: Record<string, unknown>) => DicomDictInstance;
      DicomMessage: {
        readFile(buffer: ArrayBuffer): DicomMessageFile;
      };
    };
  };

  export default dcmjs;
}
