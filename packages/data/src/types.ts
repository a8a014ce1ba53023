// Table shapes produced by the loaders

/** region -> word -> POS -> phonemes */
export type IpaTable = Map<string, Map<string, Map<string, string>>>;

/** region -> word -> syllables */
export type SyllableTable = Map<string, Map<string, string[]>>;

/** Pre-agreement spelling -> accepted post-agreement spellings, canonical first */
export type AgreementTable = Map<string, string[]>;

/** word -> POS -> phonemes */
export type HomographTable = Map<string, Map<string, string>>;

/** Historical spelling -> current spelling */
export type ArchaismTable = Map<string, string>;

export interface RegionalTables {
  ipa: IpaTable;
  syllables: SyllableTable;
  regions: Set<string>;
}
