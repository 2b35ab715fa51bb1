import { beforeEach, describe, expect, it } from 'vitest';
import { main } from '../cli.js';
import { remoteRejected } from '../errors.js';
import {
  TEST_BASE_URL,
  createHarness,
  descend,
  entityWithTaskXml,
  externalNetworkReferencesXml,
  queryResultXml,
  requestBody,
  taskXml,
  type Harness,
} from '../testing.js';
import { childText, findChildren } from '../vcd/xml.js';

const REFERENCES_PATH = '/api/admin/extension/externalNetworkReferences';

const vimServersXml =
  '<vmext:VMWVimServerReferences xmlns:vmext="http://www.vmware.com/vcloud/extension/v1.5">' +
  `<vmext:VimServerReference name="vc1" href="${TEST_BASE_URL}/api/admin/extension/vimServer/vc-1"/>` +
  '</vmext:VMWVimServerReferences>';

function withVimInventory(harness: Harness): void {
  harness.transport
    .on('GET', '/api/admin/extension/vimServerReferences', vimServersXml)
    .on('GET', '/api/query', (call) => {
      const name = (call.params?.filter ?? '').replace('name==', '');
      return queryResultXml('PortgroupRecord', [
        { name, moref: `dvportgroup-${name}`, vcName: 'vc1', portgroupType: 'DV_PORTGROUP' },
      ]);
    });
}

const createArgs = [
  'network',
  'external',
  'create',
  'ext1',
  'vc1',
  '--port-group',
  'pg1',
  '--port-group',
  'pg2',
  '--gateway',
  '10.0.0.1',
  '--netmask',
  '255.255.255.0',
];

describe('network external create', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
    withVimInventory(harness);
    harness.transport.on(
      'POST',
      '/api/admin/extension/externalnets',
      entityWithTaskXml('vmext:VMWExternalNetwork', 'ext1', 'urn:vcloud:task:c1')
    );
  });

  it('creates the network and reports the task', async () => {
    const code = await main(
      [...createArgs, '--ip-range', '10.0.0.2-10.0.0.9', '10.0.0.20-10.0.0.29', '--dns1', '8.8.8.8'],
      harness.deps
    );

    expect(code).toBe(0);
    expect(harness.output.tasks.map((task) => task.id)).toEqual(['urn:vcloud:task:c1']);
    expect(harness.output.messages).toEqual(['External network created successfully.']);
    expect(harness.sessionRequests).toEqual([{ requireVdcSelected: false }]);

    const body = await requestBody(harness.transport.callsTo('POST')[0]);
    const scope = descend(body, 'Configuration', 'IpScopes', 'IpScope');
    expect(childText(scope ?? body, 'Dns1')).toBe('8.8.8.8');
    const ranges = findChildren(descend(scope, 'IpRanges') ?? body, 'IpRange');
    expect(ranges.map((range) => childText(range, 'StartAddress'))).toEqual(['10.0.0.2', '10.0.0.20']);
    const refs = findChildren(descend(body, 'VimPortGroupRefs') ?? body, 'VimObjectRef');
    expect(refs.map((ref) => childText(ref, 'MoRef'))).toEqual(['dvportgroup-pg1', 'dvportgroup-pg2']);
  });

  it('accepts repeated --ip-range flags in order', async () => {
    const code = await main(
      [...createArgs, '--ip-range', '10.0.0.20-10.0.0.29', '--ip-range', '10.0.0.2-10.0.0.9'],
      harness.deps
    );

    expect(code).toBe(0);
    const body = await requestBody(harness.transport.callsTo('POST')[0]);
    const ranges = findChildren(descend(body, 'Configuration', 'IpScopes', 'IpScope', 'IpRanges') ?? body, 'IpRange');
    expect(ranges.map((range) => childText(range, 'EndAddress'))).toEqual(['10.0.0.29', '10.0.0.9']);
  });

  it('looks a repeated port group up once', async () => {
    const code = await main(
      ['network', 'external', 'create', 'ext1', 'vc1', '-p', 'pg1', '-p', 'pg1', '-g', '10.0.0.1', '-n', '255.255.255.0', '-i', '10.0.0.2-10.0.0.9'],
      harness.deps
    );

    expect(code).toBe(0);
    expect(harness.transport.callsTo('GET', '/api/query')).toHaveLength(1);
  });

  it('rejects a command line without port groups or ranges before any remote call', async () => {
    const code = await main(createArgs.slice(0, 5).concat(['--gateway', '10.0.0.1', '--netmask', '255.255.255.0']), harness.deps);

    expect(code).toBe(1);
    expect(harness.output.errors[0]).toMatchObject({
      kind: 'ValidationError',
      message: 'At least 1 --port-group value is required; At least 1 --ip-range value is required',
    });
    expect(harness.sessionRequests).toHaveLength(0);
    expect(harness.transport.calls).toHaveLength(0);
  });

  it('sends a repeated create to the server and reports its rejection', async () => {
    let posts = 0;
    harness.transport.on('POST', '/api/admin/extension/externalnets', () =>
      ++posts === 1
        ? entityWithTaskXml('vmext:VMWExternalNetwork', 'ext1', 'urn:vcloud:task:c1')
        : remoteRejected('Network name ext1 already exists', { statusCode: 400, minorErrorCode: 'DUPLICATE_NAME' })
    );
    const args = [...createArgs, '--ip-range', '10.0.0.2-10.0.0.9'];

    const first = await main(args, harness.deps);
    const second = await main(args, harness.deps);

    expect([first, second]).toEqual([0, 1]);
    expect(harness.transport.callsTo('POST')).toHaveLength(2);
    expect(harness.output.errors.map((error) => [error.kind, error.message])).toEqual([
      ['RemoteRejected', 'Network name ext1 already exists'],
    ]);
  });
});

describe('network external list', () => {
  it('lists networks in server order', async () => {
    const harness = createHarness();
    harness.transport.on('GET', REFERENCES_PATH, externalNetworkReferencesXml(['ext-b', 'ext-a']));

    const code = await main(['network', 'external', 'list'], harness.deps);

    expect(code).toBe(0);
    expect(harness.output.listings).toEqual([[{ name: 'ext-b' }, { name: 'ext-a' }]]);
  });

  it('lists nothing when there are no networks', async () => {
    const harness = createHarness();
    harness.transport.on('GET', REFERENCES_PATH, externalNetworkReferencesXml([]));

    expect(await main(['network', 'external', 'list'], harness.deps)).toBe(0);
    expect(harness.output.listings).toEqual([[]]);
  });

  it('does not require a selected vdc', async () => {
    const harness = createHarness({ selectedVdcHref: undefined });
    harness.transport.on('GET', REFERENCES_PATH, externalNetworkReferencesXml(['ext1']));

    expect(await main(['network', 'external', 'list'], harness.deps)).toBe(0);
  });
});

describe('network external delete', () => {
  const DELETE_PATH = '/api/admin/extension/externalnet/ext-1';

  function deleteHarness(confirmAnswer: boolean): Harness {
    const harness = createHarness({ confirmAnswer });
    harness.transport
      .on('GET', REFERENCES_PATH, externalNetworkReferencesXml(['ext1']))
      .on('DELETE', DELETE_PATH, taskXml({ id: 'urn:vcloud:task:d1', operation: 'Deleting' }));
    return harness;
  }

  it('does nothing when the prompt is declined', async () => {
    const harness = deleteHarness(false);

    const code = await main(['network', 'external', 'delete', 'ext1'], harness.deps);

    expect(code).toBe(0);
    expect(harness.prompts).toEqual(["Are you sure you want to delete the external network 'ext1'?"]);
    expect(harness.output.messages).toEqual(['Aborted.']);
    expect(harness.sessionRequests).toHaveLength(0);
    expect(harness.transport.calls).toHaveLength(0);
  });

  it('deletes once the prompt is accepted', async () => {
    const harness = deleteHarness(true);

    const code = await main(['network', 'external', 'delete', 'ext1'], harness.deps);

    expect(code).toBe(0);
    expect(harness.transport.callsTo('DELETE', DELETE_PATH)).toHaveLength(1);
    expect(harness.output.tasks.map((task) => task.id)).toEqual(['urn:vcloud:task:d1']);
    expect(harness.output.messages).toEqual(['External network deleted successfully.']);
  });

  it('skips the prompt with --yes', async () => {
    const harness = deleteHarness(false);

    expect(await main(['network', 'external', 'delete', 'ext1', '--yes'], harness.deps)).toBe(0);
    expect(harness.prompts).toEqual([]);
    expect(harness.transport.callsTo('DELETE')).toHaveLength(1);
  });

  it('fails when the network does not exist', async () => {
    const harness = deleteHarness(true);

    expect(await main(['network', 'external', 'delete', 'ext9', '-y'], harness.deps)).toBe(1);
    expect(harness.output.errors[0]?.message).toBe("External network named 'ext9' not found.");
    expect(harness.transport.callsTo('DELETE')).toHaveLength(0);
  });
});

describe('network external update', () => {
  const NETWORK_PATH = '/api/admin/extension/externalnet/ext-1';

  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
    harness.transport
      .on('GET', REFERENCES_PATH, externalNetworkReferencesXml(['ext1']))
      .on(
        'GET',
        NETWORK_PATH,
        '<vmext:VMWExternalNetwork xmlns="http://www.vmware.com/vcloud/v1.5" ' +
          'xmlns:vmext="http://www.vmware.com/vcloud/extension/v1.5" name="ext1">' +
          '<Description>old</Description><Configuration><FenceMode>isolated</FenceMode></Configuration>' +
          '</vmext:VMWExternalNetwork>'
      )
      .on('PUT', NETWORK_PATH, taskXml({ id: 'urn:vcloud:task:u1', operation: 'Updating' }));
  });

  it('keeps the current name when only a description is given', async () => {
    const code = await main(['network', 'external', 'update', 'ext1', '--description', 'new description'], harness.deps);

    expect(code).toBe(0);
    const body = await requestBody(harness.transport.callsTo('PUT')[0]);
    expect(body.attributes.name).toBe('ext1');
    expect(childText(body, 'Description')).toBe('new description');
    expect(harness.output.messages).toEqual(['External network updated successfully.']);
  });

  it('renames the network', async () => {
    const code = await main(['network', 'external', 'update', 'ext1', '-n', 'ext1-renamed'], harness.deps);

    expect(code).toBe(0);
    const body = await requestBody(harness.transport.callsTo('PUT')[0]);
    expect(body.attributes.name).toBe('ext1-renamed');
    expect(childText(body, 'Description')).toBe('old');
  });
});
