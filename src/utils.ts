export function isTruthyEnv(value: string | undefined): boolean {
  const v = (value ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function isFalsyEnv(value: string | undefined): boolean {
  const v = (value ?? '').toLowerCase().trim();
  return v === '0' || v === 'false' || v === 'no' || v === 'off';
}
