import { Group, Stack, TextInput, Title } from '@mantine/core';
import type { ChangeEvent } from 'react';
import type { UploadProfile } from '../types/analysis';

interface ProfileFieldsProps {
  profile: UploadProfile;
  onChange: (profile: UploadProfile) => void;
  /** User ID comes from the signed-in account and cannot be edited */
  userIdLocked?: boolean;
  disabled?: boolean;
}

export function ProfileFields({
  profile,
  onChange,
  userIdLocked = false,
  disabled = false,
}: ProfileFieldsProps) {
  const update =
    (field: keyof UploadProfile) =>
    (event: ChangeEvent<HTMLInputElement>) =>
      onChange({ ...profile, [field]: event.currentTarget.value });

  return (
    <Stack gap="xs">
      <Title order={4}>User Profile</Title>
      <TextInput
        label="User ID"
        value={profile.userId}
        onChange={update('userId')}
        readOnly={userIdLocked}
        disabled={disabled}
        required
      />
      <TextInput
        label="Name (optional)"
        value={profile.name}
        onChange={update('name')}
        disabled={disabled}
      />
      <Group grow>
        <TextInput
          label="Age"
          inputMode="numeric"
          value={profile.age}
          onChange={update('age')}
          disabled={disabled}
        />
        <TextInput
          label="Height (cm)"
          inputMode="numeric"
          value={profile.height}
          onChange={update('height')}
          disabled={disabled}
        />
        <TextInput
          label="Weight (kg)"
          inputMode="numeric"
          value={profile.weight}
          onChange={update('weight')}
          disabled={disabled}
        />
      </Group>
    </Stack>
  );
}
