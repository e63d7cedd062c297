import type { DevClass, Device, Vm } from '@devices-widget/shared'
import { DEFAULT_VM_ICON, UNKNOWN_DESCRIPTION, deviceKey } from '@devices-widget/shared'
import type { AdminVm, DeviceInfo } from '../admin/admin.types'
import { isAdminError } from '../errors/admin.errors'

/**
 * Build a registry device from an admin listing
 */
export const createDevice = (info: DeviceInfo, devclass: DevClass, vmIcon: string): Device => ({
  key: deviceKey(info.backendDomain, info.ident),
  backendDomain: info.backendDomain,
  ident: info.ident,
  description: info.description || UNKNOWN_DESCRIPTION,
  devclass,
  data: { ...info.data },
  attachments: new Set<string>(),
  vmIcon,
})

/**
 * Read a VM's label icon, falling back to the default icon on admin errors
 */
export const resolveIcon = async (vm: AdminVm): Promise<string> => {
  try {
    return await vm.labelIcon()
  } catch (error) {
    if (isAdminError(error)) {
      return DEFAULT_VM_ICON
    }
    throw error
  }
}

/**
 * Build a registry VM, resolving its icon once
 */
export const createVm = async (vm: AdminVm): Promise<Vm> => ({
  name: vm.name,
  icon: await resolveIcon(vm),
})
