import { z } from 'zod'

const PollingConfigSchema = z.object({
    pollIntervalMs: z.number().int().positive().describe("Delay between two status checks"),
    maxWaitMs: z.number().int().positive().describe("Maximum time to wait for the resource to be ready"),
})

export const CoreConfigSchema = z.object({
    sessionRootDir: z.string().min(1).describe("Directory holding one sub-directory per provisioning session"),
    loginAccount: z.string().regex(/^[a-z_][a-z0-9_-]*$/, { message: "Invalid login account, expected a Linux user name" }).describe("Account the generated public key is installed for on the compute node"),
    imageId: z.string().min(1).describe("Image used to boot the compute node"),
    namePrefix: z.string().regex(/^[a-z][a-z0-9-]*$/).describe("Prefix of every cloud resource name"),
    compute: PollingConfigSchema,
    database: PollingConfigSchema,
    cleanup: z.object({
        detachGracePeriodMs: z.number().int().nonnegative()
            .describe("Pause after deleting instances so that security groups and subnets are released"),
    }),
})

export type CoreConfig = z.infer<typeof CoreConfigSchema>
export type PollingConfig = z.infer<typeof PollingConfigSchema>
