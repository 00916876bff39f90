/**
 * Narrated walkthrough of the resource lifecycle: acquisition, use,
 * scoped release, explicit release and release of whatever is left.
 */

import chalk from 'chalk';
import { ResourceState, type LifeguardConfig } from '@lifeguard/core';
import {
  FILE_KIND,
  ResourceManager,
  type ConnectionDescription,
  type ConnectionDriver,
  type FileDescription,
} from '@lifeguard/resources';

export interface DemoOptions {
  config: LifeguardConfig;
  /** Receives each output line (default console.log) */
  print?: (line: string) => void;
  color?: boolean;
  clock?: () => Date;
  driver?: ConnectionDriver;
}

export interface DemoSummary {
  liveFilesAfterScope: number;
  liveFilesAfterExplicitRelease: number;
  liveAtEnd: number;
  queriesExecuted: number;
  files: FileDescription[];
  connection: ConnectionDescription;
}

export const DEMO_FILES = {
  data: 'sample-data.txt',
  log: 'system-log.txt',
  temporary: 'temporary-file.txt',
} as const;

export const DEMO_QUERIES = [
  'SELECT * FROM users',
  'SELECT * FROM products WHERE active = 1',
  'UPDATE stats SET visits = visits + 1',
] as const;

export function runDemo(options: DemoOptions): DemoSummary {
  const print = options.print ?? ((line: string) => console.log(line));
  const color = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
  const heading = (title: string): void => {
    print('');
    print(color.cyan.bold(title));
    print('-'.repeat(50));
  };

  const manager = new ResourceManager({ config: options.config, driver: options.driver, clock: options.clock });
  const { registry } = manager;

  registry.on('created', ({ resource, live }) => {
    const counted = `${resource.kind} ${resource.identifier} (live ${resource.kind}s: ${live})`;
    if (resource.state === ResourceState.Failed) {
      print(color.red(`acquire failed: ${counted}`));
    } else {
      print(color.green(`acquire: ${counted}`));
    }
  });
  registry.on('released', ({ resource, live, summary }) => {
    const details = Object.entries(summary).map(([key, value]) => `${key}=${String(value)}`).join(', ');
    print(color.yellow(`release: ${resource.kind} #${resource.id} ${resource.identifier} [${details}] (live ${resource.kind}s: ${live})`));
  });
  registry.on('diagnostic', ({ error }) => {
    print(color.red(`diagnostic: ${error.message}`));
  });

  const describeFile = (file: FileDescription): void => {
    print(`  #${file.id} ${file.identifier}: mode=${file.mode} state=${file.state} lines=${file.linesWritten}`);
  };

  try {
    heading('1. Creating instances');
    const writer = manager.openFile(DEMO_FILES.data, 'write');
    const appender = manager.openFile(DEMO_FILES.log, 'append');
    const db = manager.connect({ host: 'db.example.com', port: 3306, user: 'developer' });

    heading('2. Using the instances');
    writer.writeLine('First line of data');
    writer.writeLine('Second line of data');
    writer.writeLine('Data processed successfully');
    appender.writeLine('System started');
    appender.writeLine('User connected');
    appender.writeLine('Processing requests');
    for (const query of DEMO_QUERIES) {
      const report = db.execute(query);
      if (report) {
        print(`  query ${report.sequence}: ${report.query}`);
      }
    }

    heading('3. Instance information');
    describeFile(writer.describe());
    describeFile(appender.describe());
    const connection = db.describe();
    print(`  #${connection.id} ${connection.user}@${connection.identifier}: operations=${connection.operations}`);

    heading('4. Scoped release');
    manager.scoped((scope, owner) => {
      const temporary = scope.use(owner.openFile(DEMO_FILES.temporary, 'write'));
      temporary.writeLine('This file is released when the scope ends');
      temporary.writeLine('whichever way the scope exits');
      describeFile(temporary.describe());
    });

    heading('5. Current state');
    const liveFilesAfterScope = manager.liveCount(FILE_KIND);
    print(`  live files: ${liveFilesAfterScope}`);

    heading('6. Explicit release');
    writer.release();
    db.release();
    const liveFilesAfterExplicitRelease = manager.liveCount(FILE_KIND);
    print(`  live files: ${liveFilesAfterExplicitRelease}`);

    heading('7. Shutdown');
    manager[Symbol.dispose]();
    const liveAtEnd = manager.liveCount();
    print(`  live resources: ${liveAtEnd}`);

    return {
      liveFilesAfterScope,
      liveFilesAfterExplicitRelease,
      liveAtEnd,
      queriesExecuted: db.operations,
      files: [writer.describe(), appender.describe()],
      connection: db.describe(),
    };
  } finally {
    manager[Symbol.dispose]();
    registry.removeAllListeners();
  }
}
