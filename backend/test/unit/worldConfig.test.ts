import assert from 'node:assert'
import test from 'node:test'
import { loadWorldConfig } from '../../src/worldConfig.js'

test('defaults without environment', () => {
    assert.deepStrictEqual(loadWorldConfig({}), {
        serviceName: 'zuul-backend',
        seedBlueprintPath: undefined,
        appInsightsConnectionString: undefined,
        isTestMode: false
    })
})

test('reads and trims environment values', () => {
    const config = loadWorldConfig({
        ZUUL_SERVICE_NAME: ' zuul-staging ',
        ZUUL_SEED_BLUEPRINT: '/srv/world.json',
        APPLICATIONINSIGHTS_CONNECTION_STRING: 'InstrumentationKey=test-key',
        NODE_ENV: 'test'
    })
    assert.equal(config.serviceName, 'zuul-staging')
    assert.equal(config.seedBlueprintPath, '/srv/world.json')
    assert.equal(config.appInsightsConnectionString, 'InstrumentationKey=test-key')
    assert.equal(config.isTestMode, true)
})

test('blank values fall back', () => {
    const config = loadWorldConfig({ ZUUL_SERVICE_NAME: '   ', ZUUL_SEED_BLUEPRINT: '' })
    assert.equal(config.serviceName, 'zuul-backend')
    assert.equal(config.seedBlueprintPath, undefined)
})
