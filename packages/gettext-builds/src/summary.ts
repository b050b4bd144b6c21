/* eslint-disable no-console */
import type { RunSummary, VerificationResult, VersionOutcome } from './types'
import { appendFile } from 'node:fs/promises'
import process from 'node:process'
import { errorMessage } from './errors'

const STATUS_ICONS: Record<VersionOutcome['status'], string> = {
  'planned': '🧪',
  'built': '🔨',
  'published': '✅',
  'failed': '❌',
  'publish-failed': '❌',
  'cancelled': '⏹️',
}

function describeVerification(verification: VerificationResult | undefined): string {
  switch (verification?.status) {
    case 'verified':
      return `verified via ${verification.keyserver}`
    case 'unverified-allowed':
      return `unverified (${verification.reason.kind})`
    case 'skipped':
      return 'skipped'
    default:
      return 'n/a'
  }
}

function oneLine(text: string, limit = 200): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ').slice(0, limit)
}

export function summaryLines(summary: RunSummary): string[] {
  const lines = ['', '═'.repeat(60), summary.dryRun ? 'Build Summary (dry run)' : 'Build Summary', '═'.repeat(60)]

  if (summary.versions.length === 0)
    lines.push('', 'No versions to build')

  for (const outcome of summary.versions) {
    lines.push('', `${STATUS_ICONS[outcome.status]} ${outcome.version}: ${outcome.status}`)
    if (outcome.status !== 'planned')
      lines.push(`   signature: ${describeVerification(outcome.verification)}`)
    for (const job of outcome.jobs) {
      const seconds = (job.durationMs / 1000).toFixed(1)
      lines.push(job.status === 'succeeded'
        ? `   - ${job.target}: succeeded (${seconds}s)`
        : `   - ${job.target}: failed while ${job.failedAt ?? 'pending'}: ${job.error?.message ?? 'unknown error'}`)
    }
    if (outcome.publish)
      lines.push(`   release ${outcome.publish.tag}: ${outcome.publish.uploaded.length} uploaded, ${outcome.publish.skipped.length} skipped, ${outcome.publish.replaced.length} replaced`)
    if (outcome.error)
      lines.push(`   error: ${outcome.error.message}`)
  }

  const count = (status: VersionOutcome['status']) => summary.versions.filter(o => o.status === status).length
  lines.push('', summary.dryRun
    ? `Total: ${count('planned')} planned`
    : `Total: ${count('published')} published, ${count('built')} built, ${count('failed') + count('publish-failed')} failed, ${count('cancelled')} cancelled`)
  return lines
}

export function printSummary(summary: RunSummary): void {
  for (const line of summaryLines(summary))
    console.log(line)
}

export function jobSummaryMarkdown(summary: RunSummary): string {
  const lines = ['## Build Summary', '']
  if (summary.versions.length === 0) {
    lines.push('No missing versions.', '')
    return lines.join('\n')
  }

  lines.push('| Version | Target | Result |', '|---------|--------|--------|')
  for (const outcome of summary.versions) {
    if (outcome.jobs.length === 0)
      lines.push(`| ${outcome.version} | - | ${outcome.status} |`)
    for (const job of outcome.jobs) {
      const result = job.status === 'succeeded' ? 'succeeded' : `failed (${job.failedAt ?? 'pending'}): ${oneLine(job.error?.message ?? 'unknown error')}`
      lines.push(`| ${outcome.version} | ${job.target} | ${result} |`)
    }
  }
  lines.push('')

  const problems = summary.versions.filter(o => o.error)
  if (problems.length > 0) {
    lines.push('### Failed Versions', '', '| Version | Status | Error |', '|---------|--------|-------|')
    for (const outcome of problems)
      lines.push(`| ${outcome.version} | ${outcome.status} | ${oneLine(outcome.error?.message ?? '')} |`)
    lines.push('')
  }
  return lines.join('\n')
}

/** Appends the run to the GitHub Actions job summary, when there is one */
export async function writeJobSummary(summary: RunSummary, summaryPath = process.env.GITHUB_STEP_SUMMARY): Promise<void> {
  if (!summaryPath)
    return
  try {
    await appendFile(summaryPath, `${jobSummaryMarkdown(summary)}\n`)
  }
  catch (error) {
    console.warn(`Could not write job summary: ${errorMessage(error)}`)
  }
}
