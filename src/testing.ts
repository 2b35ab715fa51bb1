/**
 * In-process stand-ins for the vCD server and the terminal, used by tests.
 */

import type { CliDependencies } from './cli.js';
import { CliError, err, noVdcSelected, ok, remoteRejected, type Result } from './errors.js';
import type { OutputSink } from './output.js';
import type { SessionContext, SessionRequest } from './session.js';
import type { QueryParams, VcdTransport } from './vcd/client.js';
import type { TaskSummary } from './vcd/task.js';
import type { NetworkSummary } from './vcd/types.js';
import { findChild, parseXml, type XmlElement } from './vcd/xml.js';

export const TEST_BASE_URL = 'https://vcd.example.com';
export const TEST_VDC_HREF = `${TEST_BASE_URL}/api/vdc/11111111-2222-3333-4444-555555555555`;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RecordedCall {
  method: HttpMethod;
  path: string;
  params?: QueryParams;
  body?: string;
  contentType?: string;
}

export type RouteResponse = string | CliError | ((call: RecordedCall) => string | CliError);

function pathOf(href: string): string {
  return href.replace(/^https?:\/\/[^/]+/, '');
}

export class FakeVcdTransport implements VcdTransport {
  readonly calls: RecordedCall[] = [];
  private routes = new Map<string, RouteResponse>();

  on(method: HttpMethod, path: string, response: RouteResponse): this {
    this.routes.set(`${method} ${path}`, response);
    return this;
  }

  callsTo(method: HttpMethod, path?: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && (path === undefined || call.path === path));
  }

  get(href: string, params?: QueryParams): Promise<XmlElement> {
    return this.handle({ method: 'GET', path: pathOf(href), params });
  }

  post(href: string, body: string, contentType: string): Promise<XmlElement> {
    return this.handle({ method: 'POST', path: pathOf(href), body, contentType });
  }

  put(href: string, body: string, contentType: string): Promise<XmlElement> {
    return this.handle({ method: 'PUT', path: pathOf(href), body, contentType });
  }

  delete(href: string, params?: QueryParams): Promise<XmlElement> {
    return this.handle({ method: 'DELETE', path: pathOf(href), params });
  }

  private async handle(call: RecordedCall): Promise<XmlElement> {
    this.calls.push(call);
    const route = this.routes.get(`${call.method} ${call.path}`);
    if (route === undefined) {
      throw remoteRejected(`No fake route for ${call.method} ${call.path}`);
    }
    const response = typeof route === 'function' ? route(call) : route;
    if (response instanceof CliError) {
      throw response;
    }
    return parseXml(response);
  }
}

export class RecordingOutput implements OutputSink {
  readonly tasks: TaskSummary[] = [];
  readonly messages: string[] = [];
  readonly listings: NetworkSummary[][] = [];
  readonly errors: CliError[] = [];
  stdout = '';
  stderr = '';

  task(task: TaskSummary): void {
    this.tasks.push(task);
  }

  message(text: string): void {
    this.messages.push(text);
  }

  records(rows: NetworkSummary[]): void {
    this.listings.push(rows);
  }

  error(error: CliError): void {
    this.errors.push(error);
  }

  writeOut(text: string): void {
    this.stdout += text;
  }

  writeErr(text: string): void {
    this.stderr += text;
  }
}

export interface Harness {
  transport: FakeVcdTransport;
  output: RecordingOutput;
  deps: CliDependencies;
  sessionRequests: SessionRequest[];
  prompts: string[];
}

export interface HarnessOptions {
  selectedVdcHref?: string;
  confirmAnswer?: boolean;
  sessionError?: CliError;
}

/**
 * Dependencies for `main` backed by a fake transport. Session restore
 * mirrors the real one: the vdc check happens before the transport is
 * handed out.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const transport = new FakeVcdTransport();
  const output = new RecordingOutput();
  const sessionRequests: SessionRequest[] = [];
  const prompts: string[] = [];

  const deps: CliDependencies = {
    async restoreSession(request): Promise<Result<SessionContext>> {
      sessionRequests.push(request);
      if (options.sessionError) {
        return err(options.sessionError);
      }
      if (request.requireVdcSelected && !options.selectedVdcHref) {
        return err(noVdcSelected());
      }
      return ok({ client: transport, selectedVdcHref: options.selectedVdcHref });
    },
    async confirm(question) {
      prompts.push(question);
      return options.confirmAnswer ?? false;
    },
    createOutput: () => output,
    streams: output,
  };

  return { transport, output, deps, sessionRequests, prompts };
}

/** Follows a chain of child names by local name. */
export function descend(element: XmlElement | undefined, ...names: string[]): XmlElement | undefined {
  let current = element;
  for (const name of names) {
    current = current ? findChild(current, name) : undefined;
  }
  return current;
}

/** Parses the body of a recorded request. */
export function requestBody(call: RecordedCall | undefined): Promise<XmlElement> {
  return parseXml(call?.body ?? '');
}

// Canned server documents

export function taskXml(attrs: { id: string; operation?: string; status?: string; name?: string }): string {
  return (
    `<Task xmlns="http://www.vmware.com/vcloud/v1.5" id="${attrs.id}" name="${attrs.name ?? 'task'}"` +
    ` operation="${attrs.operation ?? ''}" operationName="${attrs.operation ?? ''}" status="${attrs.status ?? 'queued'}"` +
    ` href="${TEST_BASE_URL}/api/task/${attrs.id.split(':').pop() ?? attrs.id}">` +
    `<Owner name="owner-entity" href="${TEST_BASE_URL}/api/owner"/></Task>`
  );
}

export function entityWithTaskXml(root: string, name: string, taskId: string): string {
  return (
    `<${root} xmlns="http://www.vmware.com/vcloud/v1.5" xmlns:vmext="http://www.vmware.com/vcloud/extension/v1.5" name="${name}">` +
    `<Tasks>${taskXml({ id: taskId, operation: 'Creating', status: 'running' })}</Tasks></${root}>`
  );
}

export function externalNetworkReferencesXml(names: string[]): string {
  const refs = names
    .map(
      (name, index) =>
        `<vmext:ExternalNetworkReference name="${name}" href="${TEST_BASE_URL}/api/admin/extension/externalnet/ext-${index + 1}"/>`
    )
    .join('');
  return (
    `<vmext:VMWExternalNetworkReferences xmlns="http://www.vmware.com/vcloud/v1.5" ` +
    `xmlns:vmext="http://www.vmware.com/vcloud/extension/v1.5">${refs}</vmext:VMWExternalNetworkReferences>`
  );
}

export function queryResultXml(recordName: string, records: Array<Record<string, string>>, nextPage = false): string {
  const link = nextPage ? `<Link rel="nextPage" href="${TEST_BASE_URL}/api/query?page=2"/>` : '';
  const body = records
    .map((record) => {
      const attrs = Object.entries(record)
        .map(([key, value]) => ` ${key}="${value}"`)
        .join('');
      return `<${recordName}${attrs}/>`;
    })
    .join('');
  return `<QueryResultRecords xmlns="http://www.vmware.com/vcloud/v1.5">${link}${body}</QueryResultRecords>`;
}

export function vcdErrorXml(message: string, minorErrorCode = 'BAD_REQUEST', majorErrorCode = 400): string {
  return (
    `<Error xmlns="http://www.vmware.com/vcloud/v1.5" majorErrorCode="${majorErrorCode}" ` +
    `message="${message}" minorErrorCode="${minorErrorCode}"/>`
  );
}
