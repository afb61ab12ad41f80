/**
 * DynamoDB reports a failed ConditionExpression as ConditionalCheckFailedException.
 * For coordination writes that is an expected answer ("someone else got there first"),
 * not a failure.
 */
export function isConditionalCheckFailed(err: unknown): boolean {
  return (
    !!err &&
    typeof err === 'object' &&
    'name' in err &&
    err.name === 'ConditionalCheckFailedException'
  );
}

export function epochSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}
