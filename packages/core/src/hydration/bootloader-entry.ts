// Page entry: load with a plain <script> at the top of <body>.
import { installBootloader } from './bootloader';

if (typeof window !== 'undefined') {
  installBootloader(window);
}
