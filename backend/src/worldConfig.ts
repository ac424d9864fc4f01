/** World host configuration & environment resolution */

import { SERVICE_BACKEND } from '@zuul/shared'

export interface IWorldConfig {
    /** Reported as the `service` dimension on every telemetry event. */
    serviceName: string
    /** Optional path to a JSON blueprint replacing the bundled starter world. */
    seedBlueprintPath?: string
    /** Application Insights connection string; telemetry is a no-op without it. */
    appInsightsConnectionString?: string
    /** NODE_ENV=test never loads the real Application Insights client. */
    isTestMode: boolean
}

export function loadWorldConfig(env: NodeJS.ProcessEnv = process.env): IWorldConfig {
    const seedBlueprintPath = env.ZUUL_SEED_BLUEPRINT?.trim() || undefined
    const appInsightsConnectionString = env.APPLICATIONINSIGHTS_CONNECTION_STRING?.trim() || undefined
    return {
        serviceName: env.ZUUL_SERVICE_NAME?.trim() || SERVICE_BACKEND,
        seedBlueprintPath,
        appInsightsConnectionString,
        isTestMode: env.NODE_ENV === 'test'
    }
}
