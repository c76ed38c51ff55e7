/**
 * Commands run over SSH on each fresh VM, in order.
 *
 * Installs the NVIDIA driver, then the CUDA toolkit from NVIDIA's apt
 * repository, and finishes with two checks that print the driver and
 * compiler versions. Each reboot drops the SSH session; the next command
 * runs whatever the VM accepts by then.
 */

export const CUDA_KEYRING_URL =
  "https://developer.download.nvidia.com/compute/cuda/repos/ubuntu2204/x86_64/cuda-keyring_1.1-1_all.deb";

export const CUDA_SETUP_COMMANDS: readonly string[] = [
  "echo 'works'",
  "sudo apt update",
  "sudo apt upgrade -y",
  "sudo apt install -y ubuntu-drivers-common",
  "sudo apt install -y nvidia-driver-535",
  "sudo reboot now",
  "sudo apt install -y gcc",
  `wget ${CUDA_KEYRING_URL}`,
  "sudo dpkg -i cuda-keyring_1.1-1_all.deb",
  "sudo apt-get update",
  "sudo reboot now",
  "sudo apt install -y nvidia-cuda-toolkit",
  "nvidia-smi",
  "nvcc --version",
];
