// Host/CPU fallback when no compute device was requested
export const DEFAULT_DEVICE = 'default'

/** Device for one member: plain round-robin over the pool. */
export const deviceFor = (memberIndex: number, devices: readonly string[]): string =>
  devices.length === 0 ? DEFAULT_DEVICE : devices[memberIndex % devices.length]

/**
 * Assigns `memberCount` ensemble members to the device pool round-robin,
 * so no device carries more than one member above any other.
 */
export const assignDevices = (
  memberCount: number,
  devices: readonly string[]
): string[] => Array.from({ length: memberCount }, (_, i) => deviceFor(i, devices))

/** GPU index for CUDA_VISIBLE_DEVICES, e.g. "cuda:2" -> "2". */
export const visibleDeviceIndex = (device: string): string | undefined => {
  if (device === DEFAULT_DEVICE || device === 'cpu') {
    return undefined
  }
  return device.includes(':') ? device.split(':').pop() : device
}
