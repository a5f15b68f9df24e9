export type Proposition = 'harm' | 'intent' | 'empathy' | 'apology';

export type Verdict = 'YTA' | 'NTA' | 'NAH' | 'ESH' | 'Unclear' | 'NoData';

export type LabelingPolicy = 'v1' | 'v2';

export type ContentFlag = 0 | 1;

export type ContentVector = [harm: ContentFlag, intent: ContentFlag, empathy: ContentFlag, apology: ContentFlag];

export type QualityVector = [
  justification: number,
  ethic: number,
  deliberative: number,
  fairness: number,
  nonBiased: number,
];

export interface CommentVector {
  content: ContentVector;
  quality: QualityVector;
}

export interface Post {
  id: string;
  title: string;
  comments: CommentVector[];
}

export interface SoftClause {
  proposition: Proposition;
  polarity: boolean;
  weight: number;
}

export type Assignment = Readonly<Record<Proposition, boolean>>;

export interface VerdictExplanation {
  postId: string;
  title: string;
  commentCount: number;
  clauses: SoftClause[];
  assignment: Assignment | null;
  satisfiedWeight: number;
  totalWeight: number;
  tiedAssignments: number;
  verdict: Verdict;
  policy: LabelingPolicy;
}
