/**
 * Text substitution on php.ini style files
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function settingPattern(key: string): RegExp {
  return new RegExp(`^[ \\t]*;?[ \\t]*${escapeRegExp(key)}[ \\t]*=.*$`, 'm')
}

function activeSettingPattern(key: string): RegExp {
  return new RegExp(`^[ \\t]*${escapeRegExp(key)}[ \\t]*=[ \\t]*(.*?)[ \\t]*$`, 'gm')
}

/**
 * Value of the last active (uncommented) assignment of `key`
 */
export function readIniSetting(content: string, key: string): string | undefined {
  let value: string | undefined
  for (const match of content.matchAll(activeSettingPattern(key))) {
    value = match[1]
  }
  return value
}

/**
 * Keys whose active value differs from the desired one
 */
export function findOutdatedSettings(content: string, settings: Record<string, string>): string[] {
  return Object.entries(settings)
    .filter(([key, value]) => readIniSetting(content, key) !== value)
    .map(([key]) => key)
}

/**
 * Replace the first `key = ...` line (commented or not) with `key = value`,
 * appending settings that have no line at all.
 */
export function applyIniSettings(content: string, settings: Record<string, string>): string {
  let result = content
  const missing: string[] = []

  for (const [key, value] of Object.entries(settings)) {
    const line = `${key} = ${value}`
    const active = activeSettingPattern(key)
    if (active.test(result)) {
      result = result.replace(activeSettingPattern(key), () => line)
      continue
    }

    const pattern = settingPattern(key)
    if (pattern.test(result)) {
      result = result.replace(pattern, () => line)
    }
    else {
      missing.push(line)
    }
  }

  if (missing.length > 0) {
    const separator = result.length === 0 || result.endsWith('\n') ? '' : '\n'
    result = `${result}${separator}${missing.join('\n')}\n`
  }

  return result
}
