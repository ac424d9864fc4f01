// Central service naming constant so telemetry from every host reports the same label.

export const SERVICE_BACKEND = 'zuul-backend'
