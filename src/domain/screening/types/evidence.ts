// Evidence Types
//
// SearchHit — one organic result from the search collaborator
// EvidenceBundle — everything the prompt and the sources column need

export interface SearchHit {
  title: string;
  snippet: string;
  link: string;
}

export type SourceTier = 1 | 2;

export interface EvidenceSource {
  name: string;
  tier: SourceTier;
  siteFilter: string;
}

export interface EvidenceSnippet {
  source_name: string;
  title: string;
  url: string;
  text: string;
}

export interface Citation {
  label: string;
  url: string;
}

export interface EvidenceBundle {
  snippets: EvidenceSnippet[];
  digest: string;
  citations: Citation[];
  hits: Record<string, SearchHit[]>;
}
