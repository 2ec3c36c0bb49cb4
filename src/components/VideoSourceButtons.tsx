import { Button, Group, Text } from '@mantine/core';
import type { MediaSourceKind } from '../services/MediaAcquirer';

interface VideoSourceButtonsProps {
  onAcquire: (source: MediaSourceKind) => void;
  videoName: string | null;
  disabled?: boolean;
}

export function VideoSourceButtons({
  onAcquire,
  videoName,
  disabled = false,
}: VideoSourceButtonsProps) {
  return (
    <div data-testid="video-source">
      <Group grow>
        <Button
          variant="light"
          onClick={() => onAcquire('library')}
          disabled={disabled}
        >
          Pick from Gallery
        </Button>
        <Button
          variant="light"
          onClick={() => onAcquire('capture')}
          disabled={disabled}
        >
          Capture Video
        </Button>
      </Group>
      <Text size="sm" c="dimmed" mt="xs" data-testid="video-name">
        {videoName ? `Selected: ${videoName}` : 'No video selected'}
      </Text>
    </div>
  );
}
