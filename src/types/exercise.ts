/**
 * Exercise Types
 *
 * The closed set of exercises the analysis backend can score, with the
 * explicit token each one is sent as on the wire.
 */

export enum ExerciseType {
  VerticalJump = 'VERTICAL_JUMP',
  ShuttleRun = 'SHUTTLE_RUN',
  Situps = 'SITUPS',
  Pushups = 'PUSHUPS',
  PlankHold = 'PLANK_HOLD',
  StandingBroadJump = 'STANDING_BROAD_JUMP',
  Squats = 'SQUATS',
  EnduranceRun = 'ENDURANCE_RUN',
}

export interface ExerciseDefinition {
  id: ExerciseType;
  /** Token sent as the `exercise_type` form field */
  wireToken: string;
  /** Human-readable display name */
  displayName: string;
  /** Emoji icon for UI display */
  icon: string;
}

/**
 * Registry of all exercises, in the order the selector shows them.
 *
 * The wire tokens are spelled out rather than derived from the enum so a
 * rename on this side cannot silently change the request.
 */
export const EXERCISE_REGISTRY: Record<ExerciseType, ExerciseDefinition> = {
  [ExerciseType.VerticalJump]: {
    id: ExerciseType.VerticalJump,
    wireToken: 'VERTICAL_JUMP',
    displayName: 'Vertical Jump',
    icon: '\u{2B06}', // up arrow
  },
  [ExerciseType.ShuttleRun]: {
    id: ExerciseType.ShuttleRun,
    wireToken: 'SHUTTLE_RUN',
    displayName: 'Shuttle Run',
    icon: '\u{1F3C3}', // runner
  },
  [ExerciseType.Situps]: {
    id: ExerciseType.Situps,
    wireToken: 'SITUPS',
    displayName: 'Situps',
    icon: '\u{1F9D8}', // person in lotus position
  },
  [ExerciseType.Pushups]: {
    id: ExerciseType.Pushups,
    wireToken: 'PUSHUPS',
    displayName: 'Pushups',
    icon: '\u{1F4AA}', // flexed biceps
  },
  [ExerciseType.PlankHold]: {
    id: ExerciseType.PlankHold,
    wireToken: 'PLANK_HOLD',
    displayName: 'Plank Hold',
    icon: '\u{23F1}', // stopwatch
  },
  [ExerciseType.StandingBroadJump]: {
    id: ExerciseType.StandingBroadJump,
    wireToken: 'STANDING_BROAD_JUMP',
    displayName: 'Standing Broad Jump',
    icon: '\u{27A1}', // right arrow
  },
  [ExerciseType.Squats]: {
    id: ExerciseType.Squats,
    wireToken: 'SQUATS',
    displayName: 'Squats',
    icon: '\u{1F3CB}', // weight lifter
  },
  [ExerciseType.EnduranceRun]: {
    id: ExerciseType.EnduranceRun,
    wireToken: 'ENDURANCE_RUN',
    displayName: 'Endurance Run',
    icon: '\u{1F45F}', // running shoe
  },
};

const EXERCISE_VALUES: readonly string[] = Object.values(ExerciseType);

export function isValidExerciseType(value: string): value is ExerciseType {
  return EXERCISE_VALUES.includes(value);
}

/**
 * All exercise types in selector order
 */
export function getAvailableExercises(): ExerciseType[] {
  return Object.values(ExerciseType);
}

export function toWireToken(exercise: ExerciseType): string {
  return EXERCISE_REGISTRY[exercise].wireToken;
}

/**
 * Resolve a wire token back to an exercise. The backend also accepts the
 * lowercase spelling, so history records may carry either.
 */
export function parseExerciseType(token: string): ExerciseType | null {
  const normalized = token.trim().toUpperCase();
  const match = getAvailableExercises().find(
    (exercise) => EXERCISE_REGISTRY[exercise].wireToken === normalized
  );
  return match ?? null;
}

export function getExerciseDisplayName(exercise: ExerciseType): string {
  return EXERCISE_REGISTRY[exercise].displayName;
}

/**
 * Display name for a token that came back from the server, falling back to
 * the token with underscores turned into spaces.
 */
export function formatExerciseToken(token: string | null | undefined): string {
  if (!token) return 'Unknown Exercise';
  const exercise = parseExerciseType(token);
  return exercise ? getExerciseDisplayName(exercise) : token.replace(/_/g, ' ');
}
