import { z } from 'zod'
import { GPU_CLASS_NONE } from '../const'
import rawClasses from './data/resource-classes.json'

const ResourceClassTableSchema = z.object({
    gpuClasses: z.record(z.string()),
    defaultGpuClass: z.string(),
    computeLadder: z.array(z.object({
        instanceClass: z.string(),
        cpuCores: z.number().int().positive(),
        memoryGb: z.number().positive(),
    })).nonempty(),
    computeFallback: z.string(),
    databaseLadder: z.array(z.object({
        cpuCores: z.number().int().positive(),
        memoryMb: z.number().int().positive(),
    })).nonempty(),
    databaseFallbackMb: z.number().int().positive(),
})

export type ResourceClassTable = z.infer<typeof ResourceClassTableSchema>

// Ladders must be sorted on both axes for "smallest dominating tier" to be monotonic
export const RESOURCE_CLASSES: ResourceClassTable = ResourceClassTableSchema.parse(rawClasses)

export interface ComputeClass {
    instanceClass: string
    gpuEnabled: boolean
}

export function isGpuRequested(gpuClass: string | undefined): gpuClass is string {
    return gpuClass !== undefined && gpuClass.trim() !== '' && gpuClass.trim().toLowerCase() !== GPU_CLASS_NONE
}

/**
 * Map a compute request to a provider instance class.
 *
 * A GPU request ignores CPU and memory and picks the GPU family's class; an
 * unknown GPU name falls back to the entry-level GPU class. Otherwise the smallest
 * ladder tier with at least the requested cores and memory wins.
 */
export function mapResourceClass(cpuCores: number, memoryGb: number, gpuClass?: string, table: ResourceClassTable = RESOURCE_CLASSES): ComputeClass {
    if (isGpuRequested(gpuClass)) {
        const wanted = gpuClass.trim().toUpperCase()
        const match = Object.entries(table.gpuClasses).find(([name]) => name.toUpperCase() === wanted)
        return { instanceClass: match ? match[1] : table.defaultGpuClass, gpuEnabled: true }
    }

    const tier = table.computeLadder.find(t => t.cpuCores >= cpuCores && t.memoryGb >= memoryGb)
    return { instanceClass: tier ? tier.instanceClass : table.computeFallback, gpuEnabled: false }
}

/**
 * Map a database request to a memory tier (MB), same dominance rule as compute.
 */
export function mapDbClass(cpuCores: number, memoryMb: number, table: ResourceClassTable = RESOURCE_CLASSES): number {
    const tier = table.databaseLadder.find(t => t.cpuCores >= cpuCores && t.memoryMb >= memoryMb)
    return tier ? tier.memoryMb : table.databaseFallbackMb
}

/**
 * Position of an instance class in the compute ladder; the fallback ranks above
 * every tier. GPU classes are not ranked.
 */
export function computeClassRank(instanceClass: string, table: ResourceClassTable = RESOURCE_CLASSES): number {
    const index = table.computeLadder.findIndex(t => t.instanceClass === instanceClass)
    return index >= 0 ? index : table.computeLadder.length
}
