import {
  Alert,
  Badge,
  Button,
  Card,
  Container,
  Group,
  List,
  Loader,
  Modal,
  SimpleGrid,
  Stack,
  Text,
  TextInput,
  Title,
} from '@mantine/core';
import { useState } from 'react';
import { useTestHistory } from '../hooks/useTestHistory';
import { createLogger } from '../utils/logger';
import {
  buildResultDetailView,
  buildResultRow,
  buildStatsView,
  SCORE_BAND_COLORS,
  type TrendTone,
} from '../viewmodels/HistoryViewModel';
import { NoticeBanner } from './NoticeBanner';

const log = createLogger({ component: 'TestHistoryPage' });

const TREND_COLORS: Record<TrendTone, string> = {
  positive: 'green',
  negative: 'red',
  neutral: 'gray',
};

interface TestHistoryPageProps {
  initialUserId?: string;
}

export function TestHistoryPage({ initialUserId = '' }: TestHistoryPageProps) {
  const [userId, setUserId] = useState(initialUserId);
  const history = useTestHistory();

  const handleLoad = () => {
    history.loadHistory(userId).catch((error) => {
      log.error('Loading history failed', error, { action: 'load' });
    });
  };

  // Rows belong to the loaded user, not to whatever the input holds now
  const handleWorkoutPlan = (testId: string) => {
    if (!history.loadedUserId) return;
    history.loadWorkoutPlan(history.loadedUserId, testId).catch((error) => {
      log.error('Loading workout plan failed', error, { action: 'workoutPlan' });
    });
  };

  const handleDetails = (testId: string) => {
    history.loadResultDetail(testId).catch((error) => {
      log.error('Loading result detail failed', error, { action: 'details' });
    });
  };

  const handleDownload = (testId: string) => {
    history.downloadReport(testId).catch((error) => {
      log.error('Report download failed', error, { action: 'download' });
    });
  };

  const stats = history.stats ? buildStatsView(history.stats) : null;
  const rows = history.results.map(buildResultRow);
  const detail = history.resultDetail
    ? buildResultDetailView(history.resultDetail)
    : null;

  return (
    <Container size="sm" py="md">
      <Stack gap="md">
        <Title order={2}>Test Results</Title>

        <Group align="flex-end">
          <TextInput
            label="User ID"
            value={userId}
            onChange={(event) => setUserId(event.currentTarget.value)}
            style={{ flex: 1 }}
          />
          <Button onClick={handleLoad} disabled={history.isLoading}>
            Load Results
          </Button>
        </Group>

        {history.errorMessage && (
          <Alert color="red" role="alert" data-testid="history-error">
            {history.errorMessage}
          </Alert>
        )}

        <NoticeBanner notice={history.notice} onClose={history.dismissNotice} />

        {history.isLoading && <Loader />}

        {stats && (
          <Card withBorder data-testid="history-stats">
            <SimpleGrid cols={3}>
              <div>
                <Text size="xs" c="dimmed">
                  Total Tests
                </Text>
                <Text fw={700}>{stats.totalTests}</Text>
              </div>
              <div>
                <Text size="xs" c="dimmed">
                  Average
                </Text>
                <Text fw={700}>{stats.averageScore}</Text>
              </div>
              <div>
                <Text size="xs" c="dimmed">
                  Best
                </Text>
                <Text fw={700}>{stats.bestScore}</Text>
              </div>
            </SimpleGrid>
            <Badge mt="sm" color={TREND_COLORS[stats.tone]}>
              {stats.trend}
            </Badge>
          </Card>
        )}

        {!history.isLoading && stats && rows.length === 0 && (
          <Text c="dimmed">No test results yet.</Text>
        )}

        {rows.map((row) => (
          <Card key={row.testId} withBorder data-testid="history-row">
            <Group justify="space-between">
              <div>
                <Text fw={600}>{row.title}</Text>
                <Text size="xs" c="dimmed">
                  {row.date}
                </Text>
              </div>
              <Badge size="lg" color={SCORE_BAND_COLORS[row.band]}>
                {row.scoreLabel}
              </Badge>
            </Group>
            {row.preview && (
              <Text size="sm" mt="xs">
                {row.preview}
              </Text>
            )}
            <Group gap="xs" mt="xs">
              <Button variant="subtle" size="xs" onClick={() => handleDetails(row.testId)}>
                View Details
              </Button>
              <Button variant="subtle" size="xs" onClick={() => handleDownload(row.testId)}>
                Download Report
              </Button>
              <Button
                variant="subtle"
                size="xs"
                onClick={() => handleWorkoutPlan(row.testId)}
              >
                Workout Plan
              </Button>
            </Group>
          </Card>
        ))}

        {history.workoutPlan && (
          <Card withBorder data-testid="workout-plan">
            <Title order={4}>Workout Plan</Title>
            {history.workoutPlan.fitness_level && (
              <Text size="sm">Level: {history.workoutPlan.fitness_level}</Text>
            )}
            <List size="sm" mt="xs">
              {history.workoutPlan.recommendations.map((item, index) => (
                <List.Item key={`${index}-${item}`}>{item}</List.Item>
              ))}
            </List>
          </Card>
        )}
      </Stack>

      <Modal
        opened={detail !== null}
        onClose={history.closeResultDetail}
        title={detail?.title}
        transitionProps={{ duration: 0 }}
      >
        {detail && (
          <Stack gap="xs" data-testid="result-detail">
            <DetailRow label="Score" value={detail.score} />
            <DetailRow label="Date" value={detail.date} />
            <DetailRow label="Test ID" value={detail.testId} />

            <Title order={5} mt="sm">
              Summary
            </Title>
            <Text size="sm">{detail.summary}</Text>

            <DetailList title="Key Findings" items={detail.keyFindings} />
            <DetailList title="Recommendations" items={detail.recommendations} />
            <DetailList title="Form Issues" items={detail.formIssues} />

            <Group justify="flex-end" mt="md">
              <Button variant="default" onClick={history.closeResultDetail}>
                Close
              </Button>
              <Button
                onClick={() => {
                  history.closeResultDetail();
                  handleDownload(detail.testId);
                }}
              >
                Download Report
              </Button>
            </Group>
          </Stack>
        )}
      </Modal>
    </Container>
  );
}

function DetailRow({ label, value }: { label: string; value: string }) {
  return (
    <Group justify="space-between">
      <Text size="sm" c="dimmed">
        {label}
      </Text>
      <Text size="sm" data-testid={`detail-${label}`}>
        {value}
      </Text>
    </Group>
  );
}

function DetailList({ title, items }: { title: string; items: string[] }) {
  if (items.length === 0) return null;
  return (
    <>
      <Title order={5} mt="sm">
        {title}
      </Title>
      <List size="sm">
        {items.map((item, index) => (
          <List.Item key={`${index}-${item}`}>{item}</List.Item>
        ))}
      </List>
    </>
  );
}
