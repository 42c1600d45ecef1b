import { Duration, MILLISECOND, Package, Report, SECOND } from './types/report';

export function formatDuration(duration: Duration): string {
  if (duration >= SECOND) return `${(duration / SECOND).toFixed(2)}s`;
  return `${Math.round(duration / MILLISECOND)}ms`;
}

function packageStatus(pkg: Package): 'ok' | 'FAIL' {
  return pkg.tests.some(test => test.result === 'FAIL') ? 'FAIL' : 'ok';
}

function countLine(pkg: Package): string {
  const count = (result: 'PASS' | 'FAIL' | 'SKIP') =>
    pkg.tests.filter(test => test.result === result).length;

  const parts = [`${count('PASS')} passed`];
  if (count('FAIL') > 0) parts.push(`${count('FAIL')} failed`);
  if (count('SKIP') > 0) parts.push(`${count('SKIP')} skipped`);
  if (pkg.benchmarks.length > 0) {
    parts.push(`${pkg.benchmarks.length} benchmark${pkg.benchmarks.length === 1 ? '' : 's'}`);
  }
  return parts.join(', ');
}

/**
 * Human-readable summary of a report, one entry per output line
 */
export function formatSummary(report: Report): string[] {
  if (report.packages.length === 0) {
    return ['No package results found in the test output.'];
  }

  const lines: string[] = [];
  for (const pkg of report.packages) {
    lines.push(`${packageStatus(pkg).padEnd(4)} ${pkg.name} (${countLine(pkg)}) ${formatDuration(pkg.duration)}`);
  }

  const failed = report.packages.flatMap(pkg =>
    pkg.tests.filter(test => test.result === 'FAIL').map(test => ({ pkg, test }))
  );
  if (failed.length > 0) {
    lines.push('');
    lines.push('Failed tests:');
    for (const { pkg, test } of failed) {
      lines.push(`- ${pkg.name}: ${test.name} (${formatDuration(test.duration)})`);
      test.failure.forEach(detail => lines.push(`    ${detail.trim()}`));
    }
  }

  const totalTests = report.packages.reduce((sum, pkg) => sum + pkg.tests.length, 0);
  const testWord = totalTests === 1 ? 'test' : 'tests';
  const packageWord = report.packages.length === 1 ? 'package' : 'packages';
  lines.push('');
  lines.push(`${totalTests} ${testWord} in ${report.packages.length} ${packageWord}, ${report.failures()} failed`);
  return lines;
}
