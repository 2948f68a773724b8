export const withoutTmuxEnv = (
  env: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv => {
  const next = { ...env };
  delete next.TMUX;
  delete next.TMUX_PANE;
  return next;
};

export const isInsideTmux = (env: NodeJS.ProcessEnv = process.env): boolean =>
  typeof env.TMUX === "string" && env.TMUX !== "";
