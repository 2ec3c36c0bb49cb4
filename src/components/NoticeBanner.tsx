import { Alert } from '@mantine/core';
import type { Notice, NoticeLevel } from '../session/UploadSession';

const colorMap: Record<NoticeLevel, string> = {
  success: 'teal',
  error: 'red',
  info: 'blue',
};

interface NoticeBannerProps {
  notice: Notice | null;
  onClose: () => void;
}

export function NoticeBanner({ notice, onClose }: NoticeBannerProps) {
  if (!notice) return null;

  return (
    <Alert
      data-testid="notice-banner"
      color={colorMap[notice.level]}
      role={notice.level === 'error' ? 'alert' : 'status'}
      withCloseButton
      closeButtonLabel="Dismiss"
      onClose={onClose}
    >
      {notice.message}
    </Alert>
  );
}
