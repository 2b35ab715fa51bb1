import { attempt, remoteRejected, type Result } from '../errors.js';
import type { VcdTransport } from './client.js';
import { escapeFilterValue, queryRecords } from './query.js';
import { firstQueuedTask, type TaskSummary } from './task.js';
import {
  EntityType,
  type ExternalNetworkSpec,
  type ExternalNetworkUpdate,
  type NetworkSummary,
} from './types.js';
import {
  NSMAP,
  buildXml,
  compact,
  findChildren,
  localName,
  toBuildObject,
  type XmlElement,
} from './xml.js';

export interface EntityReference {
  name: string;
  href: string;
}

interface PortGroupRef {
  moref: string;
  type: string;
}

const EXTENSION_PATH = '/api/admin/extension';

/** Splits "start-end" on the first dash; a bare address becomes a one-address range. */
export function splitIpRange(range: string): { start: string; end: string } {
  const dash = range.indexOf('-');
  if (dash === -1) {
    return { start: range.trim(), end: range.trim() };
  }
  return { start: range.slice(0, dash).trim(), end: range.slice(dash + 1).trim() };
}

function toReference(element: XmlElement): EntityReference {
  return { name: element.attributes.name ?? '', href: element.attributes.href ?? '' };
}

/**
 * System-level operations. Only system administrators can work with
 * external networks.
 */
export class Platform {
  constructor(private readonly client: VcdTransport) {}

  listExternalNetworks(): Promise<Result<NetworkSummary[]>> {
    return attempt(async () => {
      const references = await this.externalNetworkReferences();
      return references.map(({ name }) => ({ name }));
    });
  }

  createExternalNetwork(spec: ExternalNetworkSpec): Promise<Result<TaskSummary>> {
    return attempt(async () => {
      const vimServer = await this.getVimServer(spec.vimServerName);
      const portGroups: PortGroupRef[] = [];
      for (const portGroupName of spec.portGroups) {
        portGroups.push(await this.getPortGroup(portGroupName, spec.vimServerName));
      }

      const ipScope = compact({
        IsInherited: 'false',
        Gateway: spec.gatewayIp,
        Netmask: spec.netmask,
        Dns1: spec.primaryDns,
        Dns2: spec.secondaryDns,
        DnsSuffix: spec.dnsSuffix,
        IpRanges: {
          IpRange: spec.ipRanges.map((range) => {
            const { start, end } = splitIpRange(range);
            return { StartAddress: start, EndAddress: end };
          }),
        },
      });

      const body = buildXml('vmext:VMWExternalNetwork', {
        $: { xmlns: NSMAP.vcloud, 'xmlns:vmext': NSMAP.vmext, name: spec.name },
        Description: spec.description ?? '',
        Configuration: {
          IpScopes: { IpScope: ipScope },
          FenceMode: 'isolated',
        },
        'vmext:VimPortGroupRefs': {
          'vmext:VimObjectRef': portGroups.map((portGroup) => ({
            'vmext:VimServerRef': { $: { href: vimServer.href } },
            'vmext:MoRef': portGroup.moref,
            'vmext:VimObjectType': portGroup.type,
          })),
        },
      });

      const created = await this.client.post(`${EXTENSION_PATH}/externalnets`, body, EntityType.EXTERNAL_NETWORK);
      return firstQueuedTask(created);
    });
  }

  deleteExternalNetwork(name: string): Promise<Result<TaskSummary>> {
    return attempt(async () => {
      const reference = await this.getExternalNetworkReference(name);
      const task = await this.client.delete(reference.href);
      return firstQueuedTask(task);
    });
  }

  /**
   * Renames and/or re-describes an external network. Fields that are not
   * supplied keep their current value on the server.
   */
  updateExternalNetwork(update: ExternalNetworkUpdate): Promise<Result<TaskSummary>> {
    return attempt(async () => {
      const reference = await this.getExternalNetworkReference(update.name);
      const network = await this.client.get(reference.href);

      const attributes = { ...network.attributes };
      if (update.newName !== undefined) {
        attributes.name = update.newName;
      }

      const children = network.children.filter((child) => localName(child.name) !== 'Tasks');
      if (update.newDescription !== undefined) {
        const existing = children.find((child) => localName(child.name) === 'Description');
        if (existing) {
          existing.text = update.newDescription;
        } else {
          const links = children.filter((child) => localName(child.name) === 'Link').length;
          children.splice(links, 0, { name: 'Description', attributes: {}, text: update.newDescription, children: [] });
        }
      }

      const body = buildXml(network.name, toBuildObject({ ...network, attributes, children }));
      const updated = await this.client.put(reference.href, body, EntityType.EXTERNAL_NETWORK);
      return firstQueuedTask(updated);
    });
  }

  /** Looks up an external network by name. */
  async getExternalNetworkReference(name: string): Promise<EntityReference> {
    const match = (await this.externalNetworkReferences()).find((reference) => reference.name === name);
    if (!match) {
      throw remoteRejected(`External network named '${name}' not found.`);
    }
    return match;
  }

  private async externalNetworkReferences(): Promise<EntityReference[]> {
    const response = await this.client.get(`${EXTENSION_PATH}/externalNetworkReferences`);
    return findChildren(response, 'ExternalNetworkReference').map(toReference);
  }

  private async getVimServer(name: string): Promise<EntityReference> {
    const response = await this.client.get(`${EXTENSION_PATH}/vimServerReferences`);
    const match = findChildren(response, 'VimServerReference')
      .map(toReference)
      .find((reference) => reference.name === name);
    if (!match) {
      throw remoteRejected(`vCenter server named '${name}' not found.`);
    }
    return match;
  }

  private async getPortGroup(name: string, vimServerName: string): Promise<PortGroupRef> {
    const records = await queryRecords(this.client, 'portgroup', `name==${escapeFilterValue(name)}`);
    const record = records.find(
      (candidate) => candidate.attributes.name === name && candidate.attributes.vcName === vimServerName
    );
    if (!record?.attributes.moref) {
      throw remoteRejected(`Port group named '${name}' not found on vCenter server '${vimServerName}'.`);
    }
    return { moref: record.attributes.moref, type: record.attributes.portgroupType || 'DV_PORTGROUP' };
  }
}
