import '@testing-library/jest-dom';
import { setLogLevel } from '@/components/sheet/logger';

setLogLevel('silent');
