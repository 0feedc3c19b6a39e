export interface SummarySection {
  heading: string;
  bullets: string[];
}

export interface Summary {
  videoId: string;
  title: string;
  sections: SummarySection[];
}
