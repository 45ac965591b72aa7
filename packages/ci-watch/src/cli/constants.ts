export const CLI_NAME = 'ci-watch';
