export const FIRST_BID_POINTS = 15;
export const REPEAT_BID_POINTS = 5;
export const PARTICIPATION_POINTS = 1;

export const ELIMINATION_STAGES = [
  'None',
  'Double Octafinals',
  'Octafinals',
  'Quarter Finals',
  'Semifinals',
  'Finals'
] as const;

export type EliminationStage = (typeof ELIMINATION_STAGES)[number];

// Checked top-down; the first band containing the rank wins.
export const RANK_BANDS: ReadonlyArray<{ best: number; worst: number; points: number }> = [
  { best: 1, worst: 3, points: 3 },
  { best: 4, worst: 6, points: 2 },
  { best: 7, worst: 10, points: 1 }
];

export const stageIndex = (stage: EliminationStage) => ELIMINATION_STAGES.indexOf(stage);

export interface ScoreInput {
  bid: boolean;
  rank: number;
  stage: EliminationStage;
  hadEarlierBid: boolean;
}

export const scoreResult = ({ bid, rank, stage, hadEarlierBid }: ScoreInput): number => {
  let points = PARTICIPATION_POINTS;

  if (bid) {
    points += hadEarlierBid ? REPEAT_BID_POINTS : FIRST_BID_POINTS;
  }

  const index = stageIndex(stage);
  if (index > 0) {
    points += index + 1;
  }

  const band = RANK_BANDS.find((b) => rank >= b.best && rank <= b.worst);
  if (band) {
    points += band.points;
  }

  return points;
};
