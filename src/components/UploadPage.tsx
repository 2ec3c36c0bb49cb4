/**
 * Upload screen: pick an exercise and a video, fill in the profile, submit,
 * then read the report and use its follow-up actions.
 */

import { Button, Container, Loader, Paper, Stack, Text, Title } from '@mantine/core';
import { useState } from 'react';
import { useUploadSession } from '../hooks/useUploadSession';
import type { MediaSourceKind } from '../services/MediaAcquirer';
import type { UploadProfile } from '../types/analysis';
import { createLogger } from '../utils/logger';
import { ExerciseSelector } from './ExerciseSelector';
import { NoticeBanner } from './NoticeBanner';
import { ProfileFields } from './ProfileFields';
import { ReportCard } from './ReportCard';
import { VideoSourceButtons } from './VideoSourceButtons';

const log = createLogger({ component: 'UploadPage' });

const EMPTY_PROFILE: UploadProfile = {
  userId: '',
  name: '',
  age: '',
  height: '',
  weight: '',
};

interface UploadPageProps {
  /** Prefilled profile, e.g. from the signed-in account */
  initialProfile?: Partial<UploadProfile>;
}

export function UploadPage({ initialProfile }: UploadPageProps) {
  const session = useUploadSession();
  const [profile, setProfile] = useState<UploadProfile>({
    ...EMPTY_PROFILE,
    ...initialProfile,
  });

  const userIdLocked = Boolean(initialProfile?.userId);
  const submitting = session.state.phase.type === 'submitting';

  const handleAcquire = (source: MediaSourceKind) => {
    session.acquireMedia(source).catch((error) => {
      log.error('Video selection failed', error, { action: 'acquire' });
    });
  };

  const handleSubmit = () => {
    session.submit(profile).catch((error) => {
      log.error('Submit failed', error, { action: 'submit' });
    });
  };

  const handleDownloadReport = () => {
    session.downloadReport().catch((error) => {
      log.error('Report download failed', error, { action: 'downloadReport' });
    });
  };

  const handleDownloadVideo = () => {
    session.downloadAnalyzedVideo().catch((error) => {
      log.error('Video download failed', error, {
        action: 'downloadAnalyzedVideo',
      });
    });
  };

  return (
    <Container size="sm" py="md">
      <Stack gap="md">
        <Title order={2}>Analyze Exercise</Title>

        <NoticeBanner notice={session.notice} onClose={session.dismissNotice} />

        <ExerciseSelector
          selected={session.exercise}
          onToggle={session.toggleExercise}
          disabled={session.isBusy}
        />

        <VideoSourceButtons
          onAcquire={handleAcquire}
          videoName={session.videoName}
          disabled={session.isBusy}
        />

        <ProfileFields
          profile={profile}
          onChange={setProfile}
          userIdLocked={userIdLocked}
          disabled={submitting}
        />

        <Button
          size="md"
          onClick={handleSubmit}
          disabled={session.isBusy}
          leftSection={submitting ? <Loader size="xs" /> : undefined}
        >
          {submitting ? 'Analyzing...' : 'Upload & Analyze'}
        </Button>

        {session.statusMessage && (
          <Paper withBorder p="sm">
            <Text
              size="sm"
              data-testid="status-message"
              style={{ whiteSpace: 'pre-line' }}
            >
              {session.statusMessage}
            </Text>
          </Paper>
        )}

        {session.reportView && !submitting && (
          <ReportCard
            view={session.reportView}
            playerUrl={session.playerUrl}
            onViewVideo={session.viewAnalyzedVideo}
            onVideoError={session.reportPlaybackFailed}
            onDownloadReport={handleDownloadReport}
            onDownloadVideo={handleDownloadVideo}
          />
        )}
      </Stack>
    </Container>
  );
}
