/**
 * `network external`: external networks, managed at system level.
 */

import type { ExternalNetworkSpec, ExternalNetworkUpdate } from '../vcd/types.js';
import { ParamReader } from './params.js';
import {
  definePlatformLeaf,
  recordsOutcome,
  taskOutcome,
  type CommandGroup,
} from './registry.js';

const create = definePlatformLeaf<ExternalNetworkSpec>({
  name: 'create',
  summary: 'create a new external network',
  arguments: [
    { name: 'name', description: 'name of the external network' },
    { name: 'vc-name', description: 'name of the vCenter server backing the network' },
  ],
  options: [
    { kind: 'list', flags: '-p, --port-group <name...>', description: 'port group to back the network (repeatable)' },
    { kind: 'value', flags: '-g, --gateway <ip>', description: 'gateway of the subnet' },
    { kind: 'value', flags: '-n, --netmask <netmask>', description: 'network mask of the subnet' },
    { kind: 'list', flags: '-i, --ip-range <start-end...>', description: 'IP range in StartAddress-EndAddress format (repeatable)' },
    { kind: 'value', flags: '-d, --description <description>', description: 'description of the external network' },
    { kind: 'value', flags: '--dns1 <ip>', description: 'IP of the primary DNS server of the subnet' },
    { kind: 'value', flags: '--dns2 <ip>', description: 'IP of the secondary DNS server of the subnet' },
    { kind: 'value', flags: '--dns-suffix <name>', description: 'DNS suffix' },
  ],
  parse(input) {
    const params = new ParamReader(input);
    const name = params.argument(0, 'name');
    const vimServerName = params.argument(1, 'vc-name');
    const portGroups = params.list('portGroup', '--port-group', 1);
    const gatewayIp = params.required('gateway', '--gateway');
    const netmask = params.required('netmask', '--netmask');
    const ipRanges = params.list('ipRange', '--ip-range', 1);

    return params.result(() => ({
      name,
      vimServerName,
      portGroups,
      gatewayIp,
      netmask,
      ipRanges,
      description: params.optional('description'),
      primaryDns: params.optional('dns1'),
      secondaryDns: params.optional('dns2'),
      dnsSuffix: params.optional('dnsSuffix'),
    }));
  },
  invoke: (platform, spec) =>
    taskOutcome(platform.createExternalNetwork(spec), 'External network created successfully.'),
});

const list = definePlatformLeaf<null>({
  name: 'list',
  summary: 'list all external networks in the system',
  arguments: [],
  options: [],
  parse: (input) => new ParamReader(input).result(() => null),
  invoke: (platform) => recordsOutcome(platform.listExternalNetworks()),
});

const remove = definePlatformLeaf<{ name: string; yes: boolean }>({
  name: 'delete',
  summary: 'delete an external network',
  arguments: [{ name: 'name', description: 'name of the external network' }],
  options: [{ kind: 'flag', flags: '-y, --yes', description: 'delete without asking for confirmation' }],
  parse(input) {
    const params = new ParamReader(input);
    const name = params.argument(0, 'name');
    return params.result(() => ({ name, yes: params.flag('yes') }));
  },
  confirmation: ({ name, yes }) =>
    yes ? undefined : `Are you sure you want to delete the external network '${name}'?`,
  invoke: (platform, { name }) =>
    taskOutcome(platform.deleteExternalNetwork(name), 'External network deleted successfully.'),
});

const update = definePlatformLeaf<ExternalNetworkUpdate>({
  name: 'update',
  summary: 'update name and description of an external network',
  arguments: [{ name: 'name', description: 'current name of the external network' }],
  options: [
    { kind: 'value', flags: '-n, --name <name>', description: 'new name of the external network' },
    { kind: 'value', flags: '-d, --description <description>', description: 'new description of the external network' },
  ],
  parse(input) {
    const params = new ParamReader(input);
    const name = params.argument(0, 'name');
    return params.result(() => ({
      name,
      newName: params.optional('name'),
      newDescription: params.optional('description'),
    }));
  },
  invoke: (platform, update) =>
    taskOutcome(platform.updateExternalNetwork(update), 'External network updated successfully.'),
});

export const externalGroup: CommandGroup = {
  name: 'external',
  summary: 'work with external networks',
  help: `
Note:
  Only System Administrators can work with external networks.

Examples:
  $ vcd-net network external create external-net1 vc1 \\
      --port-group pg1 --port-group pg2 \\
      --gateway 192.168.1.1 --netmask 255.255.255.0 \\
      --ip-range 192.168.1.2-192.168.1.49 --ip-range 192.168.1.100-192.168.1.149 \\
      --description 'External network' --dns1 8.8.8.8 --dns2 8.8.8.9 --dns-suffix example.com
      Create an external network. --port-group and --ip-range are required
      and each can be given more than once.

  $ vcd-net network external list
      List all external networks available in the system.

  $ vcd-net network external delete external-net1
      Delete an external network.

  $ vcd-net network external update external-net1 --name new-external-net1 --description 'New external network'
      Update name and description of an external network.
`,
  leaves: [create, list, remove, update],
};
