/**
 * Mock AWS SDK clients for unit testing
 */

// Mock DynamoDB Document Client
export const mockDynamoDBDocumentClient = {
  send: jest.fn(),
};

// Mock EventBridge Client
export const mockEventBridgeClient = {
  send: jest.fn(),
};

// Helper to reset all mocks
export function resetAllMocks(): void {
  mockDynamoDBDocumentClient.send.mockReset();
  mockEventBridgeClient.send.mockReset();
}

// Helper to create successful EventBridge responses
export function createEventBridgeSuccessResponse(): { FailedEntryCount: number; Entries: unknown[] } {
  return {
    FailedEntryCount: 0,
    Entries: [],
  };
}

/** Builds the error DynamoDB raises when a ConditionExpression fails. */
export function conditionalCheckFailed(): Error {
  const err = new Error('The conditional request failed');
  err.name = 'ConditionalCheckFailedException';
  return err;
}

/** Input of the Nth command passed to a mocked client. */
export function sentInput(call: number, client: { send: jest.Mock } = mockDynamoDBDocumentClient): Record<string, unknown> {
  const command: unknown = client.send.mock.calls[call]?.[0];
  if (command && typeof command === 'object' && 'input' in command) {
    const input: unknown = command.input;
    if (input && typeof input === 'object') {
      return { ...input };
    }
  }
  throw new Error(`No command input recorded for call ${call}`);
}
