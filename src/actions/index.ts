type Action = (args: string[]) => Promise<boolean>;

export const actionFactories: Record<string, () => Promise<Action>> = {
  inspect: () => import('./inspect').then((m) => m.main),
  extract: () => import('./extract').then((m) => m.main),
};
