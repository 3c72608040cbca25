export interface GlobalArgs {
  verbose: boolean;
}
