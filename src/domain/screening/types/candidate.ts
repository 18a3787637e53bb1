// Candidate: one grant opportunity pulled from the backlog.

export interface Candidate {
  id: string;
  name: string; // Opportunity name, often "Foundation - Date"
  foundation_name: string; // Leading "~" marker stripped
  search_name: string; // Legal suffixes and filler tokens stripped
  amount: number | null;
  website: string | null;
  focus_area: string | null;
  stage: string;
}
