/**
 * Load testing script for the short link API
 * Run with: npm run load-test
 */

const BASE_URL = process.env.BASE_URL || 'http://localhost:3000';
const TOTAL_REQUESTS = parseInt(process.env.REQUESTS || '100', 10);
const CONCURRENCY = parseInt(process.env.CONCURRENCY || '10', 10);

interface TestResult {
  operation: string;
  success: boolean;
  duration: number;
  statusCode?: number;
}

const results: TestResult[] = [];

async function makeRequest(method: string, path: string, operation: string): Promise<TestResult> {
  const start = performance.now();

  try {
    const response = await fetch(`${BASE_URL}${path}`, {
      method,
      redirect: 'manual',
    });

    const duration = performance.now() - start;
    return {
      operation,
      success: response.status < 400,
      duration,
      statusCode: response.status,
    };
  } catch {
    const duration = performance.now() - start;
    return {
      operation,
      success: false,
      duration,
    };
  }
}

function createdCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

async function runBatch(batchSize: number, batchIndex: number): Promise<string[]> {
  const codes: string[] = [];
  const promises: Promise<void>[] = [];

  for (let i = 0; i < batchSize; i++) {
    const promise = (async () => {
      // Create URL
      const start = performance.now();
      let code: string | undefined;
      let statusCode: number | undefined;
      try {
        const response = await fetch(`${BASE_URL}/shorten`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            long_url: `https://example.com/load/${Date.now()}/${batchIndex}/${i}`,
            expires_at: new Date(Date.now() + 300_000).toISOString(),
          }),
        });
        statusCode = response.status;
        const data: unknown = await response.json();
        code = createdCode(data);
      } catch {
        statusCode = undefined;
      }
      results.push({
        operation: 'shorten',
        success: statusCode === 201,
        duration: performance.now() - start,
        statusCode,
      });

      if (code) {
        codes.push(code);

        // The creation pre-warms the cache, so both lookups should be hits
        results.push(await makeRequest('GET', `/${code}`, 'redirect'));
        results.push(await makeRequest('GET', `/${code}`, 'redirect again'));
      }
    })();
    promises.push(promise);
  }

  await Promise.all(promises);
  return codes;
}

function percentile(sorted: number[], fraction: number): number {
  if (sorted.length === 0) return 0;
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * fraction))];
}

function summarize(label: string, group: TestResult[]): string {
  const sorted = group.map((r) => r.duration).sort((a, b) => a - b);
  const avg = sorted.reduce((a, b) => a + b, 0) / Math.max(sorted.length, 1);
  const ok = group.filter((r) => r.success).length;
  return (
    `  ${label.padEnd(16)} n=${String(group.length).padEnd(6)} ok=${String(ok).padEnd(6)} ` +
    `avg=${avg.toFixed(2)} p50=${percentile(sorted, 0.5).toFixed(2)} ` +
    `p95=${percentile(sorted, 0.95).toFixed(2)} p99=${percentile(sorted, 0.99).toFixed(2)}`
  );
}

function printStats(): void {
  if (results.length === 0) {
    console.log('No requests were made.');
    return;
  }

  const groups = new Map<string, TestResult[]>();
  for (const r of results) {
    const group = groups.get(r.operation) ?? [];
    group.push(r);
    groups.set(r.operation, group);
  }

  const statuses = new Map<string, number>();
  for (const r of results) {
    const key = r.statusCode === undefined ? 'network error' : String(r.statusCode);
    statuses.set(key, (statuses.get(key) ?? 0) + 1);
  }

  console.log('\n========================================');
  console.log('           LOAD TEST RESULTS           ');
  console.log('========================================');
  console.log(summarize('all', results));
  for (const [operation, group] of groups) {
    console.log(summarize(operation, group));
  }
  console.log('');
  console.log('Status codes:');
  for (const [status, count] of [...statuses].sort(([a], [b]) => a.localeCompare(b))) {
    console.log(`  ${status.padEnd(14)} ${count}`);
  }
  console.log('========================================\n');
}

async function main(): Promise<void> {
  console.log('Short Link Load Test');
  console.log(`Base URL: ${BASE_URL}`);
  console.log(`Total Requests: ${TOTAL_REQUESTS}`);
  console.log(`Concurrency: ${CONCURRENCY}`);
  console.log('');

  // Health check
  console.log('Checking server health...');
  const health = await makeRequest('GET', '/health', 'health');
  if (!health.success) {
    console.error('Server is not healthy. Aborting.');
    process.exit(1);
  }
  console.log('Server is healthy. Starting load test...\n');

  const startTime = performance.now();
  const batches = Math.ceil(TOTAL_REQUESTS / CONCURRENCY);
  let allCodes: string[] = [];

  for (let i = 0; i < batches; i++) {
    const batchSize = Math.min(CONCURRENCY, TOTAL_REQUESTS - i * CONCURRENCY);
    process.stdout.write(`\rBatch ${i + 1}/${batches} (${batchSize} concurrent)...`);
    const codes = await runBatch(batchSize, i);
    allCodes = allCodes.concat(codes);
  }

  const totalTime = performance.now() - startTime;
  console.log(`\n\nCompleted in ${(totalTime / 1000).toFixed(2)}s`);
  console.log(`Throughput: ${(results.length / (totalTime / 1000)).toFixed(2)} req/s`);

  printStats();

  // Cleanup
  console.log('Cleaning up test data...');
  let deleted = 0;
  for (const code of allCodes) {
    const result = await makeRequest('DELETE', `/${code}`, 'delete');
    if (result.statusCode === 204) deleted++;
  }
  console.log(`Deleted ${deleted}/${allCodes.length} test links.`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
