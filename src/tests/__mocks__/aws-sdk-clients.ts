/**
 * Mock AWS SDK clients for unit testing
 */

// Mock DynamoDB Document Client
export const mockDynamoDBDocumentClient = {
  send: jest.fn(),
};

// Mock CloudWatch Client
export const mockCloudWatchClient = {
  send: jest.fn(),
};

// Helper to reset all mocks
export function resetAllMocks(): void {
  mockDynamoDBDocumentClient.send.mockReset();
  mockCloudWatchClient.send.mockReset();
}

// Helper to build a GetCommand response for a kill switch item
export function createKillSwitchItem(fields: {
  serviceType: string;
  experimentDisabled?: boolean;
  disabledTrialKeys?: string[];
}): { Item: Record<string, unknown> } {
  return {
    Item: {
      pk: `EXPERIMENT#${fields.serviceType}`,
      sk: 'KILL_SWITCH',
      ...(fields.experimentDisabled !== undefined ? { experiment_disabled: fields.experimentDisabled } : {}),
      ...(fields.disabledTrialKeys ? { disabled_trial_keys: new Set(fields.disabledTrialKeys) } : {}),
    },
  };
}
