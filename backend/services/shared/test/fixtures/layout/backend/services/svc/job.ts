export const compiled = false;

export async function main(): Promise<void> {}
