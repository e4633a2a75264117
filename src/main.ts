import { setup } from '@/app';

setup();
