export const LABEL_MANAGED_BY = "vm-provider.io/managed-by";
export const LABEL_INSTANCE_ID = "vm-provider.io/instance-id";
export const MANAGED_BY_VALUE = "vm-provider";

export const managedBySelector = () => `${LABEL_MANAGED_BY}=${MANAGED_BY_VALUE}`;

export const instanceSelector = (vmId: string) => `${LABEL_INSTANCE_ID}=${vmId}`;

export function ownershipLabels(vmId: string): Record<string, string> {
  return {
    [LABEL_MANAGED_BY]: MANAGED_BY_VALUE,
    [LABEL_INSTANCE_ID]: vmId
  };
}
