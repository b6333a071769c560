import type { PipelineResult } from '../types';

/**
 * Human-readable terminal banners for the CLI. Structured logs still go
 * through pino; this is what an operator watches.
 */

const SEPARATOR = '='.repeat(80);
const SUBSEPARATOR = '-'.repeat(80);

export class PipelineLogger {
  private static messageCounter = 0;

  static documentStart(inputId: string, inputPath: string, mediaType: string): void {
    this.messageCounter++;
    console.log('\n' + SEPARATOR);
    console.log(`📄 Form Processing Started - Message #${this.messageCounter}`);
    console.log(SEPARATOR);
    console.log('\n📋 Document Details');
    console.log(`   Input: ${inputId}`);
    console.log(`   Path: ${inputPath}`);
    console.log(`   Media Type: ${mediaType}`);
    console.log('\n' + SEPARATOR + '\n');
  }

  static documentComplete(result: PipelineResult, durationSeconds: number): void {
    this.messageCounter++;
    const pages = result.pages ?? [];
    const totalChars = pages.reduce((sum, page) => sum + page.text.length, 0);

    console.log('\n' + SEPARATOR);
    console.log(`✅ Form Processing Complete - Message #${this.messageCounter}`);
    console.log(SEPARATOR);
    console.log('\n📊 Processing Summary');
    console.log(`   Input: ${result.inputId}`);
    console.log(`   Run: ${result.runId}`);
    console.log(`   Pages: ${pages.length} (${totalChars.toLocaleString()} chars)`);
    if (result.record) {
      console.log(`   Patient: ${result.record.name} (dob ${result.record.dob ?? 'unresolved'})`);
      console.log(`   Fields: ${result.record.fields.size}`);
    }
    console.log(`   Patient ID: ${result.patientId}${result.patientCreated ? ' (new)' : ''}`);
    console.log(`   Submission ID: ${result.submissionId}`);
    console.log(`   Duration: ${durationSeconds.toFixed(1)}s`);
    console.log('\n' + SEPARATOR + '\n');
  }

  static documentError(result: PipelineResult, durationSeconds: number): void {
    this.messageCounter++;
    console.log('\n' + SEPARATOR);
    console.log(`❌ Form Processing Failed - Message #${this.messageCounter}`);
    console.log(SEPARATOR);
    console.log('\n📋 Document Details');
    console.log(`   Input: ${result.inputId}`);
    console.log(`   Run: ${result.runId}`);
    console.log(`   States: ${result.history.join(' → ')}`);
    if (result.error) {
      console.log('\n⚠️  Error Details');
      console.log(`   Code: ${result.error.code} (${result.error.stage})`);
      console.log(`   Error: ${result.error.message}`);
      if (result.error.fatal) {
        console.log('   Status: ❌ Integrity error, needs manual review');
      } else if (result.error.retryable) {
        console.log('   Status: ❌ Failed (retryable)');
      } else {
        console.log('   Status: ❌ Failed');
      }
    }
    console.log(`   Duration: ${durationSeconds.toFixed(1)}s`);
    console.log('\n' + SEPARATOR + '\n');
  }

  static summary(results: readonly PipelineResult[]): void {
    const persisted = results.filter(result => result.status === 'persisted').length;
    console.log(SUBSEPARATOR);
    console.log(`📦 ${persisted}/${results.length} form(s) persisted`);
    for (const result of results) {
      const status = result.status === 'persisted' ? '✅' : '❌';
      const detail = result.error ? ` ${result.error.code}` : '';
      console.log(`   ${status} ${result.inputId}${detail}`);
    }
    console.log(SUBSEPARATOR + '\n');
  }
}
