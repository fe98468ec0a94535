/**
 * Whether a listed resource belongs to the audit scope. A filter ARN naming
 * a child of the candidate (`<candidate>/...`) includes the candidate, so
 * scoping to a user pool client still collects its pool.
 */
export function isResourceIncluded(candidateArn: string | undefined, filterArns: readonly string[]): boolean {
  if (filterArns.length === 0) return true;
  if (!candidateArn) return false;

  return filterArns.some(filter =>
    filter === candidateArn || filter.startsWith(`${candidateArn}/`)
  );
}
