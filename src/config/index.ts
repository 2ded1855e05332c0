export interface Config {
  input: {
    file: string;
  };
  report: {
    senderName: string;
    clientName: string;
  };
  log: {
    level: string;
  };
}

export const config: Config = {
  input: {
    file: process.env.TRANSACTIONS_FILE || 'transactions.json',
  },
  report: {
    senderName: process.env.REPORT_SENDER_NAME || 'Grace Holloway',
    clientName: process.env.REPORT_CLIENT_NAME || 'Marcus Webb',
  },
  log: {
    level: process.env.LOG_LEVEL || 'info',
  },
};
