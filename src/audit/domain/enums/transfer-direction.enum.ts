export enum TransferDirection {
  FROM = 'FROM',
  TO = 'TO',
}
