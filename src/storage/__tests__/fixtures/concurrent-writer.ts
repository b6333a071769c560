/**
 * Child process for the cross-process write test.
 *
 * argv: <database file> <writer id> <submissions>. Prints `ready` once the
 * store is open, waits for a line on stdin, then records its submissions
 * for one patient and prints how many of them created that patient.
 */

import readline from 'readline';
import { SqliteFormStore } from '../../sqlite-form-store';

async function main(): Promise<void> {
  const [filename, writerId, submissions] = process.argv.slice(2);
  const store = SqliteFormStore.open(filename);

  const input = readline.createInterface({ input: process.stdin });
  const start = new Promise<void>(resolve => input.once('line', () => resolve()));
  process.stdout.write('ready\n');
  await start;
  input.close();

  let created = 0;
  try {
    for (let visit = 1; visit <= Number(submissions); visit++) {
      const receipt = await store.recordSubmission({
        name: 'Jane Doe',
        dob: '1990-05-01',
        fields: new Map([['Writer', writerId], ['Visit', String(visit)]]),
      });
      if (receipt.patientCreated) {
        created++;
      }
    }
  } finally {
    await store.close();
  }

  process.stdout.write(`created ${created}\n`);
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
