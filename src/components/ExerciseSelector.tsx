/**
 * Exercise Selector
 *
 * One chip per exercise. Exactly one (or none) is active; clicking the
 * active chip clears the selection.
 */

import { Chip, Group, Stack, Title } from '@mantine/core';
import {
  EXERCISE_REGISTRY,
  type ExerciseType,
  getAvailableExercises,
} from '../types/exercise';

interface ExerciseSelectorProps {
  selected: ExerciseType | null;
  onToggle: (exercise: ExerciseType) => void;
  disabled?: boolean;
}

export function ExerciseSelector({
  selected,
  onToggle,
  disabled = false,
}: ExerciseSelectorProps) {
  return (
    <Stack gap="xs" data-testid="exercise-selector">
      <Title order={4}>Select Exercise Type</Title>
      <Group gap="xs">
        {getAvailableExercises().map((exerciseId) => {
          const exercise = EXERCISE_REGISTRY[exerciseId];
          return (
            <Chip
              key={exerciseId}
              value={exerciseId}
              checked={selected === exerciseId}
              onChange={() => onToggle(exerciseId)}
              disabled={disabled}
              radius="xl"
            >
              {exercise.displayName}
            </Chip>
          );
        })}
      </Group>
    </Stack>
  );
}
