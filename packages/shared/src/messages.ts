export type MessageTone = 'success' | 'info' | 'warning' | 'error';

export type MessageParams = Record<string, unknown>;

export type MessageDefinition = {
  key: string;
  title: string;
  body: string;
  tone: MessageTone;
};

const definitions: Record<string, MessageDefinition> = {
  'job.created': {
    key: 'job.created',
    title: 'Job Added',
    body: 'Job {{jobId}} ({{ticket}} for {{customer}}) added on {{printerName}} with {{totalRolls}} roll(s).',
    tone: 'success'
  },
  'job.updated': {
    key: 'job.updated',
    title: 'Job Updated',
    body: 'Job {{jobId}} ({{ticket}}) has been updated.',
    tone: 'success'
  },
  'job.completed': {
    key: 'job.completed',
    title: 'Job Completed',
    body: 'Job {{jobId}} ({{ticket}}) has been marked as complete.',
    tone: 'success'
  },
  'roll.completed': {
    key: 'roll.completed',
    title: 'Roll Complete',
    body: 'Roll {{rollNumber}} of job {{jobId}} reached {{labelsGoal}} labels on {{printerName}}.',
    tone: 'success'
  },
  'roll.stopped': {
    key: 'roll.stopped',
    title: 'Roll Stopped',
    body: 'Roll {{rollNumber}} of job {{jobId}} stopped at {{progress}} of {{labelsGoal}} labels.',
    tone: 'warning'
  },
  'printer.sharedRun': {
    key: 'printer.sharedRun',
    title: 'Printer Already Running',
    body: 'Roll {{rollNumber}} of job {{jobId}} started while job {{otherJobId}} is running on {{printerName}}; both rolls will count the same labels.',
    tone: 'warning'
  },
  'store.writeFailed': {
    key: 'store.writeFailed',
    title: 'History Not Saved',
    // Caller assembles the roll suffix; the template engine only substitutes keys.
    body: 'Could not record "{{action}}" for job {{jobId}}{{rollSuffix}}: {{reason}}.',
    tone: 'error'
  },
  'ingest.fileBusy': {
    key: 'ingest.fileBusy',
    title: 'Log File Busy',
    body: 'Could not read {{fileName}} ({{reason}}); it will be retried on the next change.',
    tone: 'warning'
  },
  'ingest.fileReset': {
    key: 'ingest.fileReset',
    title: 'Log File Replaced',
    body: '{{fileName}} shrank from {{previousRows}} to {{rows}} row(s); reprocessing it from the start.',
    tone: 'warning'
  },
  'watcher.offline': {
    key: 'watcher.offline',
    title: 'Watcher Offline',
    body: 'Watcher {{watcherName}} cannot access {{path}}; monitoring paused.',
    tone: 'error'
  },
  'watcher.restarted': {
    key: 'watcher.restarted',
    title: 'Watcher Restarted',
    body: 'Log watcher restarted after an unexpected exit (code {{code}}).',
    tone: 'warning'
  }
};

function render(template: string, params?: MessageParams): string {
  if (!params) return template;
  return template.replace(/{{\s*([\w.]+)\s*}}/g, (_match, key) => {
    const value = params[key];
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
    return String(value);
  });
}

export function getMessageDefinition(key: string): MessageDefinition | undefined {
  return definitions[key];
}

export function formatAppMessage(
  key: string,
  params?: MessageParams
): { definition: MessageDefinition; title: string; body: string } {
  const definition = getMessageDefinition(key) ?? {
    key,
    title: key,
    body: '',
    tone: 'info' as MessageTone
  };
  const title = render(definition.title, params);
  const body = render(definition.body, params);
  return { definition, title, body };
}
