export async function register() {
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    const { registerShutdownHooks } = await import('./lib/shutdown');
    registerShutdownHooks();
  }
}
