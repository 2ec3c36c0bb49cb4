/**
 * Report card shown after a successful analysis, with the follow-up
 * actions underneath.
 */

import { Button, Card, Group, List, Stack, Table, Text, Title } from '@mantine/core';
import { buildReportRows, type ReportView } from '../viewmodels/ReportViewModel';

interface ReportCardProps {
  view: ReportView;
  playerUrl: string | null;
  onViewVideo: () => void;
  /** The analyzed video failed to load or play */
  onVideoError: () => void;
  onDownloadReport: () => void;
  onDownloadVideo: () => void;
}

export function ReportCard({
  view,
  playerUrl,
  onViewVideo,
  onVideoError,
  onDownloadReport,
  onDownloadVideo,
}: ReportCardProps) {
  const rows = buildReportRows(view);

  return (
    <Card withBorder shadow="sm" padding="lg" data-testid="report-card">
      <Stack gap="sm">
        <Title order={3}>Analysis Report</Title>
        <Text size="sm" c="dimmed">
          {view.exercise} · {view.userName} · Test {view.testId}
        </Text>

        <Table>
          <Table.Tbody>
            {rows.map((row) => (
              <Table.Tr key={row.label}>
                <Table.Th>{row.label}</Table.Th>
                <Table.Td data-testid={`report-${row.label}`}>{row.value}</Table.Td>
              </Table.Tr>
            ))}
          </Table.Tbody>
        </Table>

        <Title order={4}>Feedback</Title>
        {view.hasFeedback ? (
          <List size="sm" data-testid="report-feedback">
            {view.feedback.map((line, index) => (
              <List.Item key={`${index}-${line}`}>{line}</List.Item>
            ))}
          </List>
        ) : (
          <Text size="sm" c="dimmed" data-testid="report-feedback">
            {view.feedback[0]}
          </Text>
        )}

        <Group>
          <Button
            onClick={onViewVideo}
            disabled={view.actions.analyzedVideoUrl === null}
          >
            View Analyzed Video
          </Button>
          <Button
            variant="outline"
            onClick={onDownloadReport}
            disabled={view.actions.reportDownloadUrl === null}
          >
            Download Report
          </Button>
          <Button
            variant="outline"
            onClick={onDownloadVideo}
            disabled={view.actions.videoDownloadUrl === null}
          >
            Download Analyzed Video
          </Button>
        </Group>

        {playerUrl && (
          <video
            data-testid="analyzed-video"
            src={playerUrl}
            controls
            onError={onVideoError}
            style={{ width: '100%', borderRadius: 8 }}
          />
        )}
      </Stack>
    </Card>
  );
}
