/**
 * Key segments are joined with '#', so a caller-supplied value must not be able
 * to forge a separator. '%' and '#' are percent-escaped; the mapping is
 * injective, and ordinary ids pass through unchanged.
 */
export function keySegment(value: string): string {
  return value.replace(/%/g, '%25').replace(/#/g, '%23');
}

/** Partition key holding every row that belongs to one tenant. */
export function tenantPartition(tenantId: string): string {
  return `TENANT#${keySegment(tenantId)}`;
}
