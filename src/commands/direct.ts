/**
 * `network direct`: org vdc networks directly connected to an external
 * network, in the selected vdc.
 */

import type { DirectNetworkSpec } from '../vcd/types.js';
import { ParamReader } from './params.js';
import { defineVdcLeaf, recordsOutcome, taskOutcome, type CommandGroup } from './registry.js';

interface DeleteParams {
  name: string;
  force: boolean;
  yes: boolean;
}

const create = defineVdcLeaf<DirectNetworkSpec>({
  name: 'create',
  summary: 'create a new directly connected org vdc network',
  arguments: [{ name: 'name', description: 'name of the network' }],
  options: [
    { kind: 'value', flags: '-p, --parent <external network name>', description: 'name of the external network to be connected to' },
    { kind: 'value', flags: '-d, --description <description>', description: 'description of the network to be created' },
    {
      kind: 'flag',
      flags: '-s, --shared',
      description: 'share the network with other vdc(s) in the organization',
      defaultValue: false,
      negatedBy: { flags: '-n, --not-shared', description: "don't share the network with other vdc(s)" },
    },
  ],
  parse(input) {
    const params = new ParamReader(input);
    const name = params.argument(0, 'name');
    const parentExternalNetworkName = params.required('parent', '--parent');
    return params.result(() => ({
      name,
      parentExternalNetworkName,
      description: params.optional('description'),
      isShared: params.flag('shared'),
    }));
  },
  invoke: (vdc, spec) => taskOutcome(vdc.createDirectlyConnectedNetwork(spec)),
});

const list = defineVdcLeaf<null>({
  name: 'list',
  summary: 'list all directly connected org vdc networks in the selected vdc',
  arguments: [],
  options: [],
  parse: (input) => new ParamReader(input).result(() => null),
  invoke: (vdc) => recordsOutcome(vdc.listDirectNetworks()),
});

const remove = defineVdcLeaf<DeleteParams>({
  name: 'delete',
  summary: 'delete a directly connected org vdc network in the selected vdc',
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
  invoke: (vdc, { name, force }) => taskOutcome(vdc.deleteDirectNetwork(name, force)),
});

export const directGroup: CommandGroup = {
  name: 'direct',
  summary: 'work with directly connected org vdc networks',
  help: `
Note:
  System Administrators have full control on direct org vdc networks.
  Organization Administrators can only list direct org vdc networks.

Examples:
  $ vcd-net network direct create direct-net1 --parent ext-net1 \\
      --description 'Directly connected VDC network'
      Create an org vdc network which is directly connected to an external network.

  $ vcd-net network direct list
      List all directly connected org vdc networks in the selected vdc.

  $ vcd-net network direct delete direct-net1
      Delete directly connected network 'direct-net1' in the selected vdc.
`,
  leaves: [create, list, remove],
};
