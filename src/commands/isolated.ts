/**
 * `network isolated`: org vdc networks with no external connection,
 * optionally with their own DHCP pool.
 */

import type { DhcpSpec, IsolatedNetworkSpec } from '../vcd/types.js';
import { ParamReader } from './params.js';
import { defineVdcLeaf, recordsOutcome, taskOutcome, type CommandGroup } from './registry.js';

const create = defineVdcLeaf<IsolatedNetworkSpec>({
  name: 'create',
  summary: 'create a new isolated org vdc network',
  arguments: [{ name: 'name', description: 'name of the network' }],
  options: [
    { kind: 'value', flags: '-g, --gateway <ip>', description: 'IP address of the gateway of the new network' },
    { kind: 'value', flags: '-n, --netmask <netmask>', description: 'network mask for the gateway' },
    { kind: 'value', flags: '-d, --description <description>', description: 'description of the network to be created' },
    { kind: 'value', flags: '--dns1 <ip>', description: 'IP of the primary DNS server' },
    { kind: 'value', flags: '--dns2 <ip>', description: 'IP of the secondary DNS server' },
    { kind: 'value', flags: '--dns-suffix <name>', description: 'DNS suffix' },
    { kind: 'value', flags: '--ip-range-start <ip>', description: 'start address of the static IP pool' },
    { kind: 'value', flags: '--ip-range-end <ip>', description: 'end address of the static IP pool' },
    {
      kind: 'flag',
      flags: '--dhcp-enabled',
      description: 'enable the DHCP service on the new network',
      negatedBy: { flags: '--dhcp-disabled', description: 'disable the DHCP service on the new network' },
    },
    { kind: 'value', flags: '--default-lease-time <seconds>', description: 'default lease in seconds for DHCP addresses' },
    { kind: 'value', flags: '--max-lease-time <seconds>', description: 'max lease in seconds for DHCP addresses' },
    { kind: 'value', flags: '--dhcp-ip-range-start <ip>', description: 'start address of the DHCP IP range' },
    { kind: 'value', flags: '--dhcp-ip-range-end <ip>', description: 'end address of the DHCP IP range' },
    {
      kind: 'flag',
      flags: '--shared',
      description: 'share the network with other vdc(s) in the organization',
      defaultValue: false,
      negatedBy: { flags: '--not-shared', description: "don't share the network with other vdc(s)" },
    },
  ],
  parse(input) {
    const params = new ParamReader(input);
    const name = params.argument(0, 'name');
    const gatewayIp = params.required('gateway', '--gateway');
    const netmask = params.required('netmask', '--netmask');

    const dhcpEnabled = params.toggle('dhcpEnabled');
    const defaultLeaseSeconds = params.integer('defaultLeaseTime', '--default-lease-time');
    const maxLeaseSeconds = params.integer('maxLeaseTime', '--max-lease-time');
    const rangeStart = params.optional('dhcpIpRangeStart');
    const rangeEnd = params.optional('dhcpIpRangeEnd');

    // The DHCP service is only sent when one of its options was given.
    const dhcpGiven = [dhcpEnabled, defaultLeaseSeconds, maxLeaseSeconds, rangeStart, rangeEnd].some(
      (value) => value !== undefined
    );
    const dhcp: DhcpSpec | undefined = dhcpGiven
      ? { enabled: dhcpEnabled ?? false, defaultLeaseSeconds, maxLeaseSeconds, rangeStart, rangeEnd }
      : undefined;

    return params.result(() => ({
      name,
      gatewayIp,
      netmask,
      description: params.optional('description'),
      primaryDns: params.optional('dns1'),
      secondaryDns: params.optional('dns2'),
      dnsSuffix: params.optional('dnsSuffix'),
      ipRangeStart: params.optional('ipRangeStart'),
      ipRangeEnd: params.optional('ipRangeEnd'),
      dhcp,
      isShared: params.flag('shared'),
    }));
  },
  invoke: (vdc, spec) => taskOutcome(vdc.createIsolatedNetwork(spec)),
});

const list = defineVdcLeaf<null>({
  name: 'list',
  summary: 'list all isolated org vdc networks in the selected vdc',
  arguments: [],
  options: [],
  parse: (input) => new ParamReader(input).result(() => null),
  invoke: (vdc) => recordsOutcome(vdc.listIsolatedNetworks()),
});

const remove = defineVdcLeaf<{ name: string; force: boolean; yes: boolean }>({
  name: 'delete',
  summary: 'delete an isolated org vdc network in the selected vdc',
  arguments: [{ name: 'name', description: 'name of the network' }],
  options: [
    { kind: 'flag', flags: '-f, --force', description: 'force delete the org vdc network' },
    { kind: 'flag', flags: '-y, --yes', description: 'delete without asking for confirmation' },
  ],
  parse(input) {
    const params = new ParamReader(input);
    const name = params.argument(0, 'name');
    return params.result(() => ({ name, force: params.flag('force'), yes: params.flag('yes') }));
  },
  confirmation: ({ name, force, yes }) =>
    yes || force ? undefined : `Are you sure you want to delete the OrgVdc Network '${name}'?`,
  invoke: (vdc, { name, force }) => taskOutcome(vdc.deleteIsolatedNetwork(name, force)),
});

export const isolatedGroup: CommandGroup = {
  name: 'isolated',
  summary: 'work with isolated org vdc networks',
  help: `
Note:
  Both System Administrators and Organization Administrators can create,
  delete or list isolated org vdc networks.

Examples:
  $ vcd-net network isolated create isolated-net1 --gateway 192.168.1.1 \\
      --netmask 255.255.255.0 --description 'Isolated VDC network' \\
      --dns1 8.8.8.8 --dns-suffix example.com \\
      --ip-range-start 192.168.1.100 --ip-range-end 192.168.1.199 \\
      --dhcp-enabled --default-lease-time 3600 --max-lease-time 7200 \\
      --dhcp-ip-range-start 192.168.1.200 --dhcp-ip-range-end 192.168.1.250
      Create an isolated org vdc network with a DHCP service.

  $ vcd-net network isolated list
      List all isolated org vdc networks in the selected vdc.

  $ vcd-net network isolated delete isolated-net1
      Delete isolated network 'isolated-net1' in the selected vdc.
`,
  leaves: [create, list, remove],
};
