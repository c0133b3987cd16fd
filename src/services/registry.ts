import { AppDataSource } from '../database';
import { Services, createServices } from '.';

let services: Services | undefined;

/** Services bound to the application DataSource, built on first use. */
export const getServices = (): Services => {
  if (!services) {
    services = createServices(AppDataSource);
  }
  return services;
};
