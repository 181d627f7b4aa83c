import {
  CandidateInfo,
  DifficultyLevel,
  ExtractedCandidateInfo,
  GRADE_LEVELS,
  GradeLevel,
} from '../../models/types';
import { matchEnum } from '../../utils/payload';

const GRADE_DIFFICULTY: Record<GradeLevel, DifficultyLevel> = {
  Intern: 'BASIC',
  Junior: 'BASIC',
  Middle: 'INTERMEDIATE',
  Senior: 'ADVANCED',
  Lead: 'EXPERT',
};

export const parseGradeLevel = (raw: string | undefined): GradeLevel | undefined => matchEnum(raw, GRADE_LEVELS);

export const initialDifficultyFor = (grade: GradeLevel): DifficultyLevel => GRADE_DIFFICULTY[grade];

export interface CandidateMergeResult {
  candidate: CandidateInfo;
  /** Set only when this merge filled the target grade for the first time. */
  gradeAssigned?: GradeLevel;
}

const fill = (current: string | undefined, incoming: string | undefined): string | undefined => {
  if (current) return current;
  const trimmed = incoming?.trim();
  return trimmed ? trimmed : current;
};

/**
 * Fills unset fields from `incoming`; set fields are kept. Technologies are a
 * union in first-seen order, compared case-insensitively.
 */
export const mergeCandidateInfo = (
  current: Readonly<CandidateInfo>,
  incoming: ExtractedCandidateInfo | undefined
): CandidateMergeResult => {
  if (!incoming) return { candidate: { ...current, technologies: [...current.technologies] } };

  const technologies = [...current.technologies];
  const seen = new Set(technologies.map((tech) => tech.toLowerCase()));
  for (const tech of incoming.technologies) {
    const trimmed = tech.trim();
    if (trimmed && !seen.has(trimmed.toLowerCase())) {
      seen.add(trimmed.toLowerCase());
      technologies.push(trimmed);
    }
  }

  const grade = current.targetGrade ?? parseGradeLevel(incoming.grade);

  return {
    candidate: {
      name: fill(current.name, incoming.name),
      position: fill(current.position, incoming.position),
      targetGrade: grade,
      experience: fill(current.experience, incoming.experience),
      technologies,
    },
    gradeAssigned: current.targetGrade === undefined ? grade : undefined,
  };
};
