// Runtime environment detection, read at call time so bundlers cannot inline NODE_ENV.
export const getNodeEnv = (): string | undefined => {
  try {
    const env: unknown = Reflect.get(globalThis, 'process')
    const vars = env && typeof env === 'object' ? Reflect.get(env, 'env') : undefined
    const value = vars && typeof vars === 'object' ? Reflect.get(vars, 'NODE_ENV') : undefined
    return typeof value === 'string' ? value : undefined
  } catch {
    return undefined
  }
}

export const isDevEnv = (): boolean => getNodeEnv() !== 'production'
