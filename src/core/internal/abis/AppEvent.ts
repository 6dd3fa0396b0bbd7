const AppEventABI = [
  {
    type: 'event',
    name: 'AppEvent',
    inputs: [
      {
        name: '_tag',
        type: 'uint256',
        indexed: false,
        internalType: 'uint256',
      },
      {
        name: '_data',
        type: 'bytes',
        indexed: false,
        internalType: 'bytes',
      },
    ],
    anonymous: false,
  },
] as const;

export default AppEventABI;
